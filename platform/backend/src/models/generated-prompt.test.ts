import { afterEach, describe, expect, test, vi } from "@/test";

describe("GeneratedPromptModel", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("saves a prompt linked to a conversation", async ({
    makeConversation,
    store,
  }) => {
    const conversation = await makeConversation();

    const saved = await store.generatedPrompts.create({
      name: "support-agent-v1",
      content: "You are a support agent.",
      conversationId: conversation.id,
      metadata: JSON.stringify({ tags: ["support"] }),
    });

    expect(await store.generatedPrompts.findById(saved.id)).toEqual({
      id: saved.id,
      conversationId: conversation.id,
      name: "support-agent-v1",
      content: "You are a support agent.",
      metadata: '{"tags":["support"]}',
      createdAt: saved.createdAt,
    });
  });

  test("saves a prompt outside any conversation", async ({ store }) => {
    const saved = await store.generatedPrompts.create({
      name: "standalone",
      content: "You are a planner.",
    });

    expect(saved.conversationId).toBeNull();
    expect(saved.metadata).toBeNull();
  });

  test("rejects an unknown conversation id", async ({ store }) => {
    await expect(
      store.generatedPrompts.create({
        name: "orphan",
        content: "text",
        conversationId: 4242,
      }),
    ).rejects.toThrow();
  });

  test("findById returns null for an unknown id", async ({ store }) => {
    expect(await store.generatedPrompts.findById(1)).toBeNull();
  });

  test("findAll lists newest first", async ({ store }) => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-02-01T00:00:00.000Z"));
    await store.generatedPrompts.create({ name: "older", content: "a" });
    vi.setSystemTime(new Date("2025-02-03T00:00:00.000Z"));
    await store.generatedPrompts.create({ name: "newest", content: "b" });
    vi.setSystemTime(new Date("2025-02-02T00:00:00.000Z"));
    await store.generatedPrompts.create({ name: "middle", content: "c" });

    const prompts = await store.generatedPrompts.findAll();

    expect(prompts.map((p) => p.name)).toEqual(["newest", "middle", "older"]);
  });

  test("findAll orders prompts saved at the same time by id", async ({
    store,
  }) => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-02-01T00:00:00.000Z"));
    await store.generatedPrompts.create({ name: "first", content: "a" });
    await store.generatedPrompts.create({ name: "second", content: "b" });

    const prompts = await store.generatedPrompts.findAll();

    expect(prompts.map((p) => p.name)).toEqual(["second", "first"]);
  });
});
