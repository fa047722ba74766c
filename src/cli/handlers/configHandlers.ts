import fs from 'fs-extra';
import path from 'path';
import { CONFIG_FILE, loadConfig } from '../../core/config';
import type { ConfigCheckInput } from '../schemas/configSchemas';
import type { CLIError, CLIResult } from '../types';
import { error, ErrorHints, ErrorReasons, success } from '../types';

/** Validate the configuration file and print the effective settings. Invalid files surface as `config_invalid`. */
export async function handleConfigCheck(input: ConfigCheckInput): Promise<CLIResult | CLIError> {
  const root = path.resolve(input.repo);
  const file = path.resolve(root, input.config ?? CONFIG_FILE);
  const exists = await fs.pathExists(file);
  if (input.config && !exists) {
    return error(ErrorReasons.CONFIG_NOT_FOUND, { message: `no such file: ${input.config}`, hint: ErrorHints.CONFIG_NOT_FOUND });
  }
  const config = await loadConfig(root, file);
  return success({ file: exists ? file : null, usingDefaults: !exists, config });
}
