import type { JobStatus } from '../services/job-submitter.ts';

/** Base error for the Luma MCP tools; subclasses use fixed codes. */
export class LumaMcpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isError: boolean = true,
  ) {
    super(message);
    this.name = 'LumaMcpError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Extra fields for the structured error payload returned to the caller. */
  get details(): Record<string, unknown> {
    return {};
  }
}

export class ValidationError extends LumaMcpError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
  }
}

export class RemoteError extends LumaMcpError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly failureReason?: string,
    public readonly jobId?: string,
  ) {
    super(message, 'REMOTE_ERROR', true);
    this.name = 'RemoteError';
  }

  override get details(): Record<string, unknown> {
    const details: Record<string, unknown> = {};
    if (this.statusCode !== undefined) details.status_code = this.statusCode;
    if (this.failureReason !== undefined) details.failure_reason = this.failureReason;
    if (this.jobId !== undefined) details.generation_id = this.jobId;
    return details;
  }
}

export class TimeoutError extends LumaMcpError {
  constructor(
    public readonly jobId: string,
    public readonly lastStatus: JobStatus,
    public readonly timeoutMs: number,
  ) {
    super(
      `Generation ${jobId} did not finish within ${timeoutMs}ms (last status: ${lastStatus}). Use get_generation to check on it later.`,
      'TIMEOUT',
      true,
    );
    this.name = 'TimeoutError';
  }

  override get details(): Record<string, unknown> {
    return { generation_id: this.jobId, last_status: this.lastStatus, timeout_ms: this.timeoutMs };
  }
}

/** Without a job id the call was cancelled before the provider returned one. */
export class CancelledError extends LumaMcpError {
  constructor(public readonly jobId?: string) {
    super(
      jobId === undefined
        ? 'Generation request was cancelled while submitting'
        : `Polling for generation ${jobId} was cancelled`,
      'CANCELLED',
      true,
    );
    this.name = 'CancelledError';
  }

  override get details(): Record<string, unknown> {
    return this.jobId === undefined ? {} : { generation_id: this.jobId };
  }
}

export class ConfigError extends LumaMcpError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', true);
    this.name = 'ConfigError';
  }
}
