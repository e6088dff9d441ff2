import { FreshgateRequest, FreshgateResponse } from '../types/index.js';

export class FreshgateError extends Error {
  request?: FreshgateRequest;
  response?: FreshgateResponse;
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    request?: FreshgateRequest,
    response?: FreshgateResponse,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'FreshgateError';
    this.request = request;
    this.response = response;
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Timeout phases for granular error reporting
 */
export type TimeoutPhase =
  | 'connect'       // TCP connection
  | 'response'      // First byte (TTFB)
  | 'request';      // Total request time

/**
 * Timeout error with phase information
 */
export class TimeoutError extends FreshgateError {
  phase: TimeoutPhase;
  timeout: number;

  constructor(
    request?: FreshgateRequest,
    options?: {
      phase?: TimeoutPhase;
      timeout?: number;
    }
  ) {
    const phase = options?.phase || 'request';
    const timeout = options?.timeout;

    const phaseMessages: Record<TimeoutPhase, string> = {
      connect: 'TCP connection timed out',
      response: 'Waiting for response timed out (TTFB)',
      request: 'Request timed out (total time exceeded)',
    };

    let message = phaseMessages[phase];
    if (timeout !== undefined) {
      message += ` after ${timeout}ms`;
    }

    super(
      message,
      request,
      undefined,
      [
        'Verify network connectivity and DNS resolution for the target host.',
        'Increase the timeout or optimize the upstream response time.'
      ],
      true
    );
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeout = timeout ?? 0;
  }
}

export class NetworkError extends FreshgateError {
  code?: string;

  constructor(message: string, code?: string, request?: FreshgateRequest) {
    const suggestions = [
      'Confirm the host and port are reachable from this environment.',
      'Check proxy/VPN/firewall settings that might block the request.',
      'Retry the request or switch transport if this is transient.'
    ];
    super(message, request, undefined, suggestions, true);
    this.name = 'NetworkError';
    this.code = code;
  }
}

/**
 * Error thrown when a request is aborted through its AbortSignal
 */
export class AbortError extends FreshgateError {
  reason?: string;

  constructor(reason?: string, request?: FreshgateRequest) {
    super(
      reason || 'Request was aborted',
      request,
      undefined,
      [
        'Check if the abort was intentional (user-triggered or timeout).',
        'Ensure AbortController is not being triggered prematurely.'
      ],
      true
    );
    this.name = 'AbortError';
    this.reason = reason;
  }
}

/**
 * A Cache-Control directive that was asked for is not asserted
 */
export class MissingDirectiveError extends FreshgateError {
  directive: string;

  constructor(directive: string) {
    super(
      `Cache-Control directive "${directive}" not found`,
      undefined,
      undefined,
      ['The origin did not send this directive; fall back to other freshness signals.']
    );
    this.name = 'MissingDirectiveError';
    this.directive = directive;
  }
}

/**
 * A Cache-Control directive is asserted with a value that cannot be used
 */
export class InvalidDirectiveError extends FreshgateError {
  directive: string;
  value: string;

  constructor(directive: string, value: string) {
    super(
      `Cache-Control directive "${directive}" has invalid value "${value}"`,
      undefined,
      undefined,
      ['Delta-seconds values must be decimal integers (e.g. max-age=60).']
    );
    this.name = 'InvalidDirectiveError';
    this.directive = directive;
    this.value = value;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends FreshgateError {
  configKey?: string;

  constructor(
    message: string,
    options?: {
      configKey?: string;
    }
  ) {
    super(
      message,
      undefined,
      undefined,
      [
        'Check the options object or environment variables.',
        'Verify the configuration values are in the correct format.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * Error thrown when stored data cannot be decoded
 */
export class ParseError extends FreshgateError {
  format?: string;

  constructor(
    message: string,
    options?: {
      format?: string;
      request?: FreshgateRequest;
    }
  ) {
    super(
      message,
      options?.request,
      undefined,
      [
        'Verify the input is in the expected format.',
        'Check for malformed or corrupted data in the storage backend.'
      ],
      false
    );
    this.name = 'ParseError';
    this.format = options?.format;
  }
}
