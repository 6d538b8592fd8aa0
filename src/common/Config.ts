import { ConfigError } from './Errors';

export interface ReconcileConfig {
  httpPort: number;
  reportMaxLines: number;
  uniqueInputs: boolean;
}

export const DEFAULT_CONFIG: ReconcileConfig = {
  httpPort: 3000,
  reportMaxLines: 2000,
  uniqueInputs: false,
};

export function resolveConfig(config?: Partial<ReconcileConfig>): ReconcileConfig {
  const resolved = { ...DEFAULT_CONFIG, ...config };

  if (!Number.isInteger(resolved.httpPort) || resolved.httpPort < 0 || resolved.httpPort > 65535) {
    throw new ConfigError(`httpPort must be an integer between 0 and 65535, got ${resolved.httpPort}`);
  }
  if (!Number.isInteger(resolved.reportMaxLines) || resolved.reportMaxLines < 1) {
    throw new ConfigError(`reportMaxLines must be an integer >= 1, got ${resolved.reportMaxLines}`);
  }

  return resolved;
}
