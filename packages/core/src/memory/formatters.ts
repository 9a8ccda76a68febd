/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Text rendering for conversation memory.
 *
 * Transcripts feed the condensation and profile prompts. Profile text is
 * sanitized before it is placed into the system prompt, since it is model
 * output that gets re-injected on every call.
 */

import type { Turn } from './types.js';

/**
 * Patterns stripped from profile text before injection.
 * These look like system instructions and could steer the model.
 */
const SANITIZE_PATTERNS: RegExp[] = [
  // Role prefixes
  /^System:\s*/gim,
  /^Developer:\s*/gim,
  /^Assistant:\s*/gim,
  /^User:\s*/gim,
  // Instruction injection attempts
  /^Ignore previous.*/gim,
  /^You must.*/gim,
  /^From now on.*/gim,
  /^New instructions:.*/gim,
  /^Forget everything.*/gim,
];

/**
 * Strip instruction-like lines from text that will be placed in a prompt.
 */
export function sanitizeProfileText(text: string): string {
  let sanitized = text;
  for (const pattern of SANITIZE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '');
  }
  return sanitized.trim();
}

/**
 * Render the user and assistant turns as `role: content` lines.
 * Tool and system turns, and assistant turns without text, are left out.
 */
export function renderTranscript(turns: readonly Turn[]): string {
  return turns
    .filter(
      (turn): turn is Extract<Turn, { role: 'user' | 'assistant' }> =>
        turn.role === 'user' || turn.role === 'assistant',
    )
    .filter((turn) => turn.content !== null && turn.content.trim() !== '')
    .map((turn) => `${turn.role}: ${turn.content}`)
    .join('\n');
}

/**
 * Truncate text for log lines.
 */
export function preview(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
