/**
 * @module @switchboard/progress-reporter/conversation
 * Display helpers for a finished transcript.
 */

import type { Message } from "@switchboard/supervisor-contracts";
import type { ConversationRow } from "./types.js";

/**
 * Human and AI rows of a transcript, in order. Handoff markers are control
 * records and are left out.
 */
export function formatConversation(messages: readonly Message[]): ConversationRow[] {
  const rows: ConversationRow[] = [];
  for (const message of messages) {
    if (message.kind === "human") {
      rows.push({ role: "Human", sender: message.sender, content: message.content });
    } else if (message.kind === "ai") {
      rows.push({ role: "AI", sender: message.sender, content: message.content });
    }
  }
  return rows;
}

/**
 * Plain-text conversation flow, one row per line.
 */
export function renderConversation(messages: readonly Message[]): string {
  const rows = formatConversation(messages);
  const width = Math.max(0, ...rows.map((row) => `${row.role} (${row.sender})`.length));

  return rows
    .map((row) => `${`${row.role} (${row.sender})`.padEnd(width)} | ${row.content}`)
    .join("\n");
}
