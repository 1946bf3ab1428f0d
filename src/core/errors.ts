export class AgentLayerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AgentLayerError';
  }
}

export class ConfigError extends AgentLayerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * The rule source exists but cannot be read as `{ rules: [...] }`.
 * Callers choose between failing hard and falling back to an empty rule set.
 */
export class MalformedRuleSetError extends AgentLayerError {
  constructor(message: string, public readonly source: string, cause?: Error) {
    super(message, 'MALFORMED_RULE_SET', 'rules', cause);
    this.name = 'MalformedRuleSetError';
  }
}

export class ProviderError extends AgentLayerError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'PROVIDER_ERROR', 'generate', cause);
    this.name = 'ProviderError';
  }
}

export class HistoryStoreError extends AgentLayerError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'HISTORY_ERROR', 'record', cause);
    this.name = 'HistoryStoreError';
  }
}

export class InvalidRequestError extends AgentLayerError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 'request');
    this.name = 'InvalidRequestError';
  }
}

/** Normalise an unknown thrown value for use as an error `cause`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
