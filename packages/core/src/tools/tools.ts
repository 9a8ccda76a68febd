/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Declarative tools.
 *
 * A tool declares its name, description and JSON parameter schema for the
 * model, validates the raw arguments of a call, and builds an invocation that
 * does the work. Validation failures raise {@link ToolArgumentError}; the
 * registry turns every failure into a tool result.
 */

import type { z } from 'zod';
import type { ToolDeclaration, ToolParameterSchema } from '../llm/chat.js';
import { ToolArgumentError } from '../utils/errors.js';

// =============================================================================
// Invocations
// =============================================================================

export interface ToolInvocation<TParams, TResult> {
  readonly params: TParams;

  /** Short description for log lines */
  getDescription(): string;

  execute(signal?: AbortSignal): Promise<TResult>;
}

export abstract class BaseToolInvocation<TParams, TResult>
  implements ToolInvocation<TParams, TResult>
{
  constructor(readonly params: TParams) {}

  abstract getDescription(): string;

  abstract execute(signal?: AbortSignal): Promise<TResult>;
}

// =============================================================================
// Tools
// =============================================================================

/**
 * What the registry needs from a tool, whatever its parameter type.
 */
export interface AnyDeclarativeTool {
  readonly name: string;
  readonly declaration: ToolDeclaration;
  build(args: Record<string, unknown>): ToolInvocation<unknown, unknown>;
}

export abstract class BaseDeclarativeTool<TParams, TResult>
  implements AnyDeclarativeTool
{
  constructor(
    readonly name: string,
    readonly displayName: string,
    readonly description: string,
    readonly parameterSchema: ToolParameterSchema,
    private readonly paramsSchema: z.ZodType<TParams, z.ZodTypeDef, unknown>,
  ) {}

  get declaration(): ToolDeclaration {
    return {
      name: this.name,
      description: this.description,
      parameters: this.parameterSchema,
    };
  }

  /**
   * Validates raw arguments and returns a ready invocation.
   *
   * @throws ToolArgumentError when the arguments do not fit the schema
   */
  build(args: Record<string, unknown>): ToolInvocation<TParams, TResult> {
    const parsed = this.paramsSchema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
        .join('; ');
      throw new ToolArgumentError(`Invalid arguments: ${issues}`);
    }
    const invalid = this.validateToolParamValues(parsed.data);
    if (invalid !== null) {
      throw new ToolArgumentError(invalid);
    }
    return this.createInvocation(parsed.data);
  }

  /**
   * Checks beyond the schema. Returns an error message or null.
   */
  protected validateToolParamValues(_params: TParams): string | null {
    return null;
  }

  protected abstract createInvocation(
    params: TParams,
  ): ToolInvocation<TParams, TResult>;
}

// =============================================================================
// Function tools
// =============================================================================

export interface FunctionToolDefinition<TParams, TResult> {
  name: string;
  displayName: string;
  description: string;
  parameters: ToolParameterSchema;
  schema: z.ZodType<TParams, z.ZodTypeDef, unknown>;
  validate?: (params: TParams) => string | null;
  run: (params: TParams, signal?: AbortSignal) => Promise<TResult>;
}

class FunctionToolInvocation<TParams, TResult> extends BaseToolInvocation<
  TParams,
  TResult
> {
  constructor(
    private readonly definition: FunctionToolDefinition<TParams, TResult>,
    params: TParams,
  ) {
    super(params);
  }

  getDescription(): string {
    return `${this.definition.name} ${JSON.stringify(this.params)}`;
  }

  execute(signal?: AbortSignal): Promise<TResult> {
    return this.definition.run(this.params, signal);
  }
}

/**
 * A tool whose work is a single async function.
 */
export class FunctionTool<TParams, TResult> extends BaseDeclarativeTool<
  TParams,
  TResult
> {
  constructor(private readonly definition: FunctionToolDefinition<TParams, TResult>) {
    super(
      definition.name,
      definition.displayName,
      definition.description,
      definition.parameters,
      definition.schema,
    );
  }

  protected override validateToolParamValues(params: TParams): string | null {
    return this.definition.validate ? this.definition.validate(params) : null;
  }

  protected createInvocation(
    params: TParams,
  ): ToolInvocation<TParams, TResult> {
    return new FunctionToolInvocation(this.definition, params);
  }
}

export function defineTool<TParams, TResult>(
  definition: FunctionToolDefinition<TParams, TResult>,
): FunctionTool<TParams, TResult> {
  return new FunctionTool(definition);
}
