export interface StepweaveConfig {
  logLevel: string;
  logTruncateLength: number;
  redactKeys: string[];
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const DEFAULT_REDACT_KEYS = ['password', 'token', 'api_key', 'secret', 'auth'];

const toList = (value: string | undefined, fallback: string[]): string[] => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): StepweaveConfig => {
  const logLevel = env.STEPWEAVE_LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new Error(`STEPWEAVE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const rawTruncateLength = env.STEPWEAVE_LOG_TRUNCATE_LENGTH?.trim() || '200';
  const logTruncateLength = Number(rawTruncateLength);
  if (!Number.isInteger(logTruncateLength) || logTruncateLength <= 0) {
    throw new Error('STEPWEAVE_LOG_TRUNCATE_LENGTH must be a positive integer');
  }

  return {
    logLevel,
    logTruncateLength,
    redactKeys: toList(env.STEPWEAVE_REDACT_KEYS, DEFAULT_REDACT_KEYS),
  };
};
