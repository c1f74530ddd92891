import assert from "node:assert/strict";
import test from "node:test";

import {
  formatAlertMessage,
  formatTimestamp,
  sanitizeReason,
  stripMarkup,
  truncateMessage
} from "../../src/modules/notification/formatter.js";

const localMorning = new Date(2026, 2, 10, 9, 5);

test("formats a HIGH alert with sanitized reasons", () => {
  const message = formatAlertMessage({
    score: 82.4,
    reasons: ["🌊 MARINE: Ancona_Bay: High waves 2.5m", "x_*y`z"],
    level: "HIGH",
    eta: "45-90 minutes",
    locationName: "Falconara Marittima",
    now: localMorning
  });

  assert.equal(
    message,
    [
      "*🚨 HIGH ALERT - Falconara Marittima*",
      "*Risk Score:* 82%",
      "*Estimated Arrival:* 45-90 minutes",
      "",
      "*⚡ Active Conditions:*",
      "• 🌊 MARINE: AnconaBay: High waves 2.5m",
      "• xyz",
      "",
      "*🕐 Time:* 09:05 - 10/03/2026"
    ].join("\n")
  );
});

test("CRITICAL alerts carry the action block and no reasons section when empty", () => {
  const message = formatAlertMessage({
    score: 100,
    reasons: [],
    level: "CRITICAL",
    eta: "15-45 minutes (BORA - IMMEDIATE DANGER)",
    locationName: "Falconara Marittima",
    now: localMorning
  });

  assert.equal(
    message,
    [
      "*🚨🚨🚨 CRITICAL ALERT - Falconara Marittima*",
      "*Risk Score:* 100%",
      "*Estimated Arrival:* 15-45 minutes (BORA - IMMEDIATE DANGER)",
      "",
      "",
      "*🚨 IMMEDIATE ACTION REQUIRED:*",
      "• Secure all outdoor items NOW",
      "• Avoid coastal areas",
      "• Check mooring lines",
      "",
      "*🕐 Time:* 09:05 - 10/03/2026"
    ].join("\n")
  );
});

test("lists at most six reasons", () => {
  const reasons = Array.from({ length: 8 }, (_, index) => `reason ${index + 1}`);

  const message = formatAlertMessage({
    score: 45,
    reasons,
    level: "MEDIUM",
    eta: "2-3 hours",
    locationName: "Falconara Marittima",
    now: localMorning
  });

  const bullets = message.split("\n").filter((line) => line.startsWith("• "));
  assert.deepEqual(bullets, [
    "• reason 1",
    "• reason 2",
    "• reason 3",
    "• reason 4",
    "• reason 5",
    "• reason 6"
  ]);
});

test("long messages are cut below the transport limit", () => {
  const message = formatAlertMessage({
    score: 45,
    reasons: ["w".repeat(5_000)],
    level: "MEDIUM",
    eta: "2-3 hours",
    locationName: "Falconara Marittima",
    now: localMorning
  });

  assert.equal(message.length, 4_093);
  assert.ok(message.endsWith("w..."));
});

test("truncateMessage leaves short text alone and keeps surrogate pairs whole", () => {
  assert.equal(truncateMessage("short", 10), "short");
  assert.equal(truncateMessage("abcdefghij", 8), "ab...");
  assert.equal(truncateMessage("a😀bcdefghij", 8), "a...");
});

test("formatTimestamp renders local HH:MM - DD/MM/YYYY", () => {
  assert.equal(formatTimestamp(new Date(2026, 11, 1, 23, 59)), "23:59 - 01/12/2026");
});

test("markup helpers remove the expected characters", () => {
  assert.equal(sanitizeReason("*bold* _it_ `c` [x](y)"), "bold it c [x](y)");
  assert.equal(stripMarkup("*bold* _it_ [link](url) `c`"), "bold it linkurl c");
});
