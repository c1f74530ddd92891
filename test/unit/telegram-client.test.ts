import assert from "node:assert/strict";
import test from "node:test";

import { TelegramClient, normalizeChatId } from "../../src/connectors/telegram/client.js";

interface CapturedRequest {
  url: string;
  body: unknown;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

function createClient(responses: Response[], captured: CapturedRequest[], maxMessageLength?: number) {
  return new TelegramClient({
    botToken: "test-secret",
    chatId: "-100200300",
    baseUrl: "https://telegram.test/",
    requestTimeoutMs: 1_000,
    maxMessageLength,
    fetchImpl: async (input, init) => {
      captured.push({ url: String(input), body: JSON.parse(String(init?.body)) });
      const next = responses.shift();
      if (!next) {
        throw new Error("unexpected request");
      }
      return next;
    }
  });
}

test("sends Markdown to the bot endpoint with a numeric chat id", async () => {
  const captured: CapturedRequest[] = [];
  const client = createClient([jsonResponse({ ok: true })], captured);

  const delivered = await client.deliver("*storm* incoming");

  assert.equal(delivered, true);
  assert.deepEqual(captured, [
    {
      url: "https://telegram.test/bottest-secret/sendMessage",
      body: { chat_id: -100200300, text: "*storm* incoming", parse_mode: "Markdown" }
    }
  ]);
});

test("retries once as plain text when Markdown parsing is rejected", async () => {
  const captured: CapturedRequest[] = [];
  const client = createClient(
    [
      jsonResponse(
        { ok: false, description: "Bad Request: can't parse entities: unexpected end" },
        400
      ),
      jsonResponse({ ok: true })
    ],
    captured
  );

  const delivered = await client.deliver("*storm* [incoming](now)");

  assert.equal(delivered, true);
  assert.deepEqual(
    captured.map((request) => request.body),
    [
      { chat_id: -100200300, text: "*storm* [incoming](now)", parse_mode: "Markdown" },
      { chat_id: -100200300, text: "storm incomingnow" }
    ]
  );
});

test("other 400 responses fail without a retry", async () => {
  const captured: CapturedRequest[] = [];
  const client = createClient(
    [jsonResponse({ ok: false, description: "Bad Request: chat not found" }, 400)],
    captured
  );

  assert.equal(await client.deliver("storm"), false);
  assert.equal(captured.length, 1);
});

test("a failed plain-text retry is reported as undelivered", async () => {
  const captured: CapturedRequest[] = [];
  const client = createClient(
    [
      new Response("Bad Request: can't parse entities", { status: 400 }),
      new Response("Bad Request: message is too long", { status: 400 })
    ],
    captured
  );

  assert.equal(await client.deliver("*storm*"), false);
  assert.equal(captured.length, 2);
});

test("server errors and network failures are undelivered", async () => {
  const captured: CapturedRequest[] = [];
  const client = createClient([new Response("bad gateway", { status: 502 })], captured);

  assert.equal(await client.deliver("storm"), false);
  assert.equal(await client.deliver("storm again"), false);
  assert.equal(captured.length, 2);
});

test("an error body that stalls is cut off by the request timeout", { timeout: 5_000 }, async () => {
  let requestSignal: AbortSignal | undefined;
  const client = new TelegramClient({
    botToken: "test-secret",
    chatId: "-100200300",
    baseUrl: "https://telegram.test",
    requestTimeoutMs: 25,
    fetchImpl: async (_input, init) => {
      const signal = init?.signal ?? undefined;
      requestSignal = signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          if (signal) {
            signal.addEventListener("abort", () => {
              controller.error(signal.reason);
            });
          }
        }
      });
      return new Response(body, { status: 502 });
    }
  });

  assert.equal(await client.deliver("storm"), false);
  assert.equal(requestSignal?.aborted, true);
});

test("messages over the limit are truncated before sending", async () => {
  const captured: CapturedRequest[] = [];
  const client = createClient([jsonResponse({ ok: true })], captured, 10);

  await client.deliver("abcdefghijklmno");

  assert.deepEqual(captured[0]?.body, {
    chat_id: -100200300,
    text: "abcd...",
    parse_mode: "Markdown"
  });
});

test("normalizeChatId keeps channel usernames as strings", () => {
  assert.equal(normalizeChatId(" 12345 "), 12345);
  assert.equal(normalizeChatId("-100200300"), -100200300);
  assert.equal(normalizeChatId("@storm_channel"), "@storm_channel");
});

test("requires a bot token and chat id", () => {
  assert.throws(
    () => new TelegramClient({ botToken: " ", chatId: "1", requestTimeoutMs: 1_000 }),
    /non-empty botToken/
  );
  assert.throws(
    () => new TelegramClient({ botToken: "test-secret", chatId: "", requestTimeoutMs: 1_000 }),
    /non-empty chatId/
  );
});
