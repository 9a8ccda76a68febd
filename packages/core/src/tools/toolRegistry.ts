/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Name → tool table built once per session.
 *
 * Dispatch never throws for a bad call: unknown names, invalid arguments and
 * handler failures all come back as the text of the tool result, so the
 * reasoning loop can carry on.
 */

import type { ToolDeclaration } from '../llm/chat.js';
import type { ToolCall } from '../memory/types.js';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { AnyDeclarativeTool } from './tools.js';

export interface ToolDispatchResult {
  /** Text of the tool turn */
  content: string;
  ok: boolean;
}

/**
 * Strings pass through; anything else is JSON-encoded.
 */
export function encodeToolResult(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? 'null';
}

export class ToolRegistry {
  private readonly tools = new Map<string, AnyDeclarativeTool>();

  constructor(tools: readonly AnyDeclarativeTool[] = []) {
    for (const tool of tools) {
      this.registerTool(tool);
    }
  }

  registerTool(tool: AnyDeclarativeTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  getTool(name: string): AnyDeclarativeTool | undefined {
    return this.tools.get(name);
  }

  getToolNames(): string[] {
    return [...this.tools.keys()];
  }

  /** Declarations in registration order */
  getFunctionDeclarations(): ToolDeclaration[] {
    return [...this.tools.values()].map((tool) => tool.declaration);
  }

  async dispatch(call: ToolCall, signal?: AbortSignal): Promise<ToolDispatchResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      debugLogger.warn(`[ToolRegistry] Unknown tool '${call.name}'`);
      return { content: `Unknown tool '${call.name}'`, ok: false };
    }

    try {
      const invocation = tool.build(call.args);
      debugLogger.debug(`[ToolRegistry] ${invocation.getDescription()}`);
      const result = await invocation.execute(signal);
      return { content: encodeToolResult(result), ok: true };
    } catch (error) {
      const message = getErrorMessage(error);
      debugLogger.warn(`[ToolRegistry] ${call.name} failed: ${message}`);
      return { content: `Error from ${call.name}: ${message}`, ok: false };
    }
  }
}
