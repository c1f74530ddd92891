import { AlertLevels, type AlertLevel } from "../alert-scoring/constants.js";
import type { AlertMessageInput } from "./types.js";

export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;
export const MAX_REASON_LINES = 6;

const TRUNCATION_MARKER = "...";

const LEVEL_HEADERS: Readonly<Record<AlertLevel, string>> = Object.freeze({
  CRITICAL: "🚨🚨🚨 CRITICAL ALERT",
  HIGH: "🚨 HIGH ALERT",
  MEDIUM: "⚠️ MEDIUM ALERT",
  LOW: "ℹ️ LOW ALERT"
});

const CRITICAL_ADVISORY = [
  "*🚨 IMMEDIATE ACTION REQUIRED:*",
  "• Secure all outdoor items NOW",
  "• Avoid coastal areas",
  "• Check mooring lines"
];

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())} - ${pad2(date.getDate())}/${pad2(
    date.getMonth() + 1
  )}/${date.getFullYear()}`;
}

/** Drops the characters Telegram Markdown treats as inline entities. */
export function sanitizeReason(reason: string): string {
  return reason.replace(/[*_`]/g, "");
}

/** Plain-text fallback for a payload the transport refused to parse. */
export function stripMarkup(text: string): string {
  return text.replace(/[*_`[\]()]/g, "");
}

export function truncateMessage(message: string, maxLength: number): string {
  if (message.length <= maxLength) {
    return message;
  }
  let cut = Math.max(0, maxLength - 2 * TRUNCATION_MARKER.length);
  const lastCode = message.charCodeAt(cut - 1);
  // Do not split a surrogate pair.
  if (lastCode >= 0xd800 && lastCode <= 0xdbff) {
    cut -= 1;
  }
  return `${message.slice(0, cut)}${TRUNCATION_MARKER}`;
}

export function formatAlertMessage(
  input: AlertMessageInput,
  maxLength: number = TELEGRAM_MAX_MESSAGE_LENGTH
): string {
  const lines: string[] = [
    `*${LEVEL_HEADERS[input.level]} - ${input.locationName}*`,
    `*Risk Score:* ${input.score.toFixed(0)}%`,
    `*Estimated Arrival:* ${input.eta}`,
    ""
  ];

  if (input.reasons.length > 0) {
    lines.push("*⚡ Active Conditions:*");
    for (const reason of input.reasons.slice(0, MAX_REASON_LINES)) {
      lines.push(`• ${sanitizeReason(reason)}`);
    }
  }

  if (input.level === AlertLevels.CRITICAL) {
    lines.push("", ...CRITICAL_ADVISORY);
  }

  lines.push("", `*🕐 Time:* ${formatTimestamp(input.now)}`);

  return truncateMessage(lines.join("\n"), maxLength);
}
