import test from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import { createRelayApp } from "../src/app.js";
import type { Config } from "../src/config/schema.js";
import {
  FakeChannel,
  StubCompletionClient,
  createConfig,
  createNoopLogger,
  noSleep,
  systemInstruction
} from "./test-utils.js";

const createHarness = (
  client: StubCompletionClient = new StubCompletionClient(),
  config: Config = createConfig(),
  channel: FakeChannel = new FakeChannel()
) => {
  const app = createRelayApp({
    config,
    logger: createNoopLogger(),
    client,
    channel,
    sleep: noSleep
  });
  return { app, client, channel, router: app.router, store: app.store };
};

test("unauthorized users are dropped without a reply or a session", async () => {
  const { app, channel, router, store } = createHarness();

  await router.handleInbound({ chatId: 1, userId: 7, text: "hello" });
  await router.handleInbound({ chatId: 1, userId: 7, text: "/reset" });

  assert.deepEqual(channel.sent, []);
  assert.equal(store.size, 0);
  assert.equal(app.telemetry.snapshot().relay.unauthorized, 2);
});

test("an authorized message creates the session and delivers the answer", async () => {
  const { channel, router, store } = createHarness();

  await router.handleInbound({ chatId: 1, userId: 42, text: "hello" });

  assert.deepEqual(channel.typing, [1]);
  assert.deepEqual(channel.sent, [{ chatId: 1, content: "reply 1", formatted: true }]);
  assert.deepEqual(store.get(1)?.messages, [
    systemInstruction,
    { role: "user", content: "hello" },
    { role: "assistant", content: "reply 1" }
  ]);
});

test("long answers are delivered as ordered fixed-size chunks", async () => {
  const { channel, router } = createHarness(
    new StubCompletionClient(async () => "abcdefghij"),
    createConfig({ telegram: { chunkSizeLimit: 4 } })
  );

  await router.handleInbound({ chatId: 3, userId: 42, text: "spell it" });

  assert.deepEqual(
    channel.sent.map((message) => message.content),
    ["abcd", "efgh", "ij"]
  );
});

test("a failed completion is reported to the user as plain text", async () => {
  const { channel, router, store } = createHarness(
    new StubCompletionClient(async () => {
      throw new Error("quota exceeded");
    })
  );

  await router.handleInbound({ chatId: 1, userId: 42, text: "hi" });

  assert.deepEqual(channel.sent, [
    {
      chatId: 1,
      content:
        "Sorry, something went wrong while processing your request. Please try again later. Error: quota exceeded",
      formatted: false
    }
  ]);
  assert.equal(store.get(1)?.messages.length, 2);
});

test("admin commands on an unknown chat are silent no-ops", async () => {
  const { channel, router, store } = createHarness();

  await router.handleInbound({ chatId: 5, userId: 42, text: "/model gpt-4" });
  await router.handleInbound({ chatId: 5, userId: 42, text: "/reset" });

  assert.deepEqual(channel.sent, []);
  assert.equal(store.size, 0);
  assert.equal(router.setModel(5, "gpt-4"), false);
  assert.equal(router.reset(5), false);
});

test("/model switches the session model and confirms it", async () => {
  const { channel, client, router, store } = createHarness();
  await router.handleInbound({ chatId: 1, userId: 42, text: "hello" });

  await router.handleInbound({ chatId: 1, userId: 42, text: "/model gpt-4" });
  assert.equal(store.get(1)?.model, "gpt-4");
  assert.deepEqual(channel.sent.at(-1), { chatId: 1, content: "Using model gpt-4.", formatted: false });

  await router.handleInbound({ chatId: 1, userId: 42, text: "again" });
  assert.equal(client.completeCalls.at(-1)?.model, "gpt-4");

  await router.handleInbound({ chatId: 1, userId: 42, text: "/model" });
  assert.equal(store.get(1)?.model, "gpt-3.5-turbo");
});

test("/model rejects a model outside the configured allow-list", async () => {
  const { channel, router, store } = createHarness(
    new StubCompletionClient(),
    createConfig({ allowedModels: ["gpt-4"] })
  );
  await router.handleInbound({ chatId: 1, userId: 42, text: "hello" });

  await router.handleInbound({ chatId: 1, userId: 42, text: "/model text-davinci" });

  assert.equal(store.get(1)?.model, "gpt-3.5-turbo");
  assert.deepEqual(channel.sent.at(-1), {
    chatId: 1,
    content: "Unknown model text-davinci. Available models: gpt-4.",
    formatted: false
  });
});

test("/reset clears the conversation back to the system instruction", async () => {
  const { channel, router, store } = createHarness();
  await router.handleInbound({ chatId: 1, userId: 42, text: "hello" });

  await router.handleInbound({ chatId: 1, userId: 42, text: "/reset" });

  assert.deepEqual(store.get(1)?.messages, [systemInstruction]);
  assert.deepEqual(channel.sent.at(-1), { chatId: 1, content: "Conversation reset.", formatted: false });
});

test("unsupported commands are ignored", async () => {
  const { channel, router, store } = createHarness();

  await router.handleInbound({ chatId: 1, userId: 42, text: "/start" });

  assert.deepEqual(channel.sent, []);
  assert.equal(store.size, 0);
});

test("concurrent messages for one chat are answered in arrival order", async () => {
  const client = new StubCompletionClient(async (_req, call) => {
    if (call === 1) {
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    return `reply ${call}`;
  });
  const { channel, router, store } = createHarness(client);

  await Promise.all([
    router.handleInbound({ chatId: 1, userId: 42, text: "first" }),
    router.handleInbound({ chatId: 1, userId: 42, text: "second" })
  ]);

  assert.deepEqual(store.get(1)?.messages, [
    systemInstruction,
    { role: "user", content: "first" },
    { role: "assistant", content: "reply 1" },
    { role: "user", content: "second" },
    { role: "assistant", content: "reply 2" }
  ]);
  assert.deepEqual(
    channel.sent.map((message) => message.content),
    ["reply 1", "reply 2"]
  );
});

test("delivery failures are logged without failing the turn", async () => {
  const channel = new FakeChannel((content) => content === "reply 1");
  const { app, router, store } = createHarness(new StubCompletionClient(), createConfig(), channel);

  await router.handleInbound({ chatId: 1, userId: 42, text: "hello" });

  assert.equal(store.get(1)?.messages.length, 3);
  assert.equal(app.telemetry.snapshot().relay.deliveryFailures, 1);
});

test("the app starts and stops its channel once", async () => {
  const { app, channel } = createHarness();

  await app.start();
  await app.start();
  assert.equal(channel.started, true);
  assert.equal(app.isRunning(), true);

  await app.stop();
  assert.equal(channel.started, false);
  assert.equal(app.isRunning(), false);
});

test("the startup log names the channel in use", async () => {
  const lines: string[] = [];
  const logger = pino({ level: "info" }, { write: (line: string) => lines.push(line) });
  const app = createRelayApp({
    config: createConfig(),
    logger,
    client: new StubCompletionClient(),
    channel: new FakeChannel(),
    sleep: noSleep
  });

  await app.start();
  await app.stop();

  const started = lines
    .map((line): unknown => JSON.parse(line))
    .find(
      (entry): entry is object =>
        typeof entry === "object" && entry !== null && Reflect.get(entry, "msg") === "relay started"
    );
  assert.equal(started === undefined ? undefined : Reflect.get(started, "channel"), "fake");
});
