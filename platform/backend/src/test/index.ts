export { afterEach, beforeEach, describe, expect, vi } from "vitest";
export { test } from "./fixtures";
