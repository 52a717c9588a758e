import type { TextContent, ImageContent } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './logger.ts';
import { LumaMcpError } from './errors.ts';

export type ToolResult = {
  content: Array<TextContent | ImageContent>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

export function toErrorResult(error: unknown): ToolResult {
  if (error instanceof LumaMcpError) {
    return {
      content: [{ type: 'text', text: `Error: ${error.message}` }],
      structuredContent: {
        error: { kind: error.code, message: error.message, ...error.details },
      },
      isError: true,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: 'text', text: `Unexpected error: ${message}` }],
    structuredContent: { error: { kind: 'UNEXPECTED_ERROR', message } },
    isError: true,
  };
}

export function withToolErrorHandler<TArgs extends unknown[], TResult extends ToolResult>(
  toolName: string,
  fn: (...args: TArgs) => Promise<TResult>,
): (...args: TArgs) => Promise<ToolResult> {
  return async (...args: TArgs): Promise<ToolResult> => {
    try {
      return await fn(...args);
    } catch (error) {
      const level = error instanceof LumaMcpError ? 'warn' : 'error';
      logger[level](
        {
          tool: toolName,
          code: error instanceof LumaMcpError ? error.code : undefined,
          error: error instanceof Error ? error.message : String(error),
        },
        'Tool execution failed',
      );
      return toErrorResult(error);
    }
  };
}
