import test from "node:test";
import assert from "node:assert/strict";
import { parseCommand, resolveModel } from "../src/bus/commands.js";
import { createConfig } from "./test-utils.js";

test("parseCommand recognizes model and reset commands", () => {
  assert.deepEqual(parseCommand("/model gpt-4"), { name: "model", argument: "gpt-4" });
  assert.deepEqual(parseCommand("/model@relay_bot   gpt-4o  "), {
    name: "model",
    argument: "gpt-4o"
  });
  assert.deepEqual(parseCommand("/model"), { name: "model", argument: "" });
  assert.deepEqual(parseCommand("/RESET"), { name: "reset" });
});

test("parseCommand flags other commands and ignores plain text", () => {
  assert.deepEqual(parseCommand("/start"), { name: "unsupported", command: "start" });
  assert.equal(parseCommand("hello /model"), null);
  assert.equal(parseCommand("what is 1/2?"), null);
});

test("resolveModel falls back to the default model for an empty argument", () => {
  const config = createConfig({ provider: { model: "gpt-3.5-turbo" } });
  assert.deepEqual(resolveModel("", config), { ok: true, model: "gpt-3.5-turbo" });
});

test("resolveModel accepts any model when no allow-list is configured", () => {
  assert.deepEqual(resolveModel("anything-goes", createConfig()), {
    ok: true,
    model: "anything-goes"
  });
});

test("resolveModel enforces a configured allow-list", () => {
  const config = createConfig({ allowedModels: ["gpt-4", "gpt-4o"] });
  assert.deepEqual(resolveModel("gpt-4o", config), { ok: true, model: "gpt-4o" });
  assert.deepEqual(resolveModel("davinci", config), {
    ok: false,
    model: "davinci",
    allowed: ["gpt-4", "gpt-4o"]
  });
  assert.deepEqual(resolveModel("", config), { ok: true, model: "gpt-3.5-turbo" });
});
