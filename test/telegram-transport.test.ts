import test from "node:test";
import assert from "node:assert/strict";

import { formatBatchMessage } from "../src/transports/format.js";
import { TelegramTransport, type FetchLike } from "../src/transports/telegram.js";
import type { PredictionBatch } from "../src/types.js";
import { SUMMER_AMPHITHEATER, record } from "./fixtures/catalog.js";

interface Call {
  url: string;
  body: string;
}

function fakeFetch(responses: Array<{ ok: boolean; status: number; body: string }>): {
  fetchImpl: FetchLike;
  calls: Call[];
} {
  const calls: Call[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, body: init.body });
    const next = responses[Math.min(calls.length - 1, responses.length - 1)];
    return { ok: next.ok, status: next.status, text: async () => next.body };
  };
  return { fetchImpl, calls };
}

const BATCH: PredictionBatch = {
  trigger: { bandName: "Goose", nextShowDate: "2025-07-19", venueName: "Red Rocks Amphitheatre" },
  context: SUMMER_AMPHITHEATER,
  records: [record("Hot Love & The Lazy Poet", "wildcard")],
  algorithmVersion: "goldilocks_v9.0",
  generatedAt: "2025-07-18T12:00:00.000Z",
  showsAnalyzed: 60,
  confidenceScore: 0.7,
};

function transport(fetchImpl: FetchLike): TelegramTransport {
  return new TelegramTransport({
    token: "test-token",
    chatId: "test-chat",
    maxRequestsPerMinute: 0,
    fetchImpl,
  });
}

test("sends the HTML message to the bot API", async () => {
  const { fetchImpl, calls } = fakeFetch([{ ok: true, status: 200, body: "{}" }]);
  await transport(fetchImpl).sendBatch(BATCH);

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "https://api.telegram.org/bottest-token/sendMessage");
  assert.equal(
    calls[0].body,
    JSON.stringify({
      chat_id: "test-chat",
      text: formatBatchMessage(BATCH, { markup: "telegram_html" }),
      parse_mode: "HTML",
      disable_web_page_preview: true,
    }),
  );
});

test("falls back to plain text when formatting is rejected", async () => {
  const { fetchImpl, calls } = fakeFetch([
    { ok: false, status: 400, body: "can't parse entities" },
    { ok: true, status: 200, body: "{}" },
  ]);
  await transport(fetchImpl).sendBatch(BATCH);

  assert.equal(calls.length, 2);
  assert.equal(
    calls[1].body,
    JSON.stringify({
      chat_id: "test-chat",
      text: formatBatchMessage(BATCH, { markup: "plain" }),
      disable_web_page_preview: true,
    }),
  );
});

test("reports the failure when both attempts fail", async () => {
  const { fetchImpl } = fakeFetch([{ ok: false, status: 403, body: "bot was blocked" }]);
  await assert.rejects(transport(fetchImpl).sendBatch(BATCH), /Telegram sendMessage failed \(403\): bot was blocked/);
});
