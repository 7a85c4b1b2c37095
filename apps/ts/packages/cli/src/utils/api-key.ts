import { getConfig } from '@flexreport/shared';
import { CLIValidationError } from './error-handling.js';

/**
 * Arguments every command accepts
 */
export const commonArgs = {
  'api-key': {
    type: 'string',
    description: 'CloudHealth API key (default: CLOUDHEALTH_API_KEY)',
  },
  debug: {
    type: 'boolean',
    description: 'Enable detailed output for debugging',
  },
} as const;

/**
 * The `--api-key` flag wins over CLOUDHEALTH_API_KEY
 */
export function resolveApiKey(flag: string | undefined): string {
  const fromFlag = flag?.trim();
  if (fromFlag) {
    return fromFlag;
  }

  const fromEnv = getConfig().apiKey;
  if (fromEnv) {
    return fromEnv;
  }

  throw new CLIValidationError('API key is required: pass --api-key or set CLOUDHEALTH_API_KEY');
}
