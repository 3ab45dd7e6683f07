import { logger } from '../utils/logger.js';
import { formatCliError } from './format-cli-error.js';

export async function runCliAction(
  options: { json?: boolean },
  buildOutput: () => string | Promise<string>,
): Promise<void> {
  try {
    console.log(await buildOutput());
  } catch (error) {
    const output = formatCliError(error, options);

    if (output.stream === 'stdout') {
      console.log(output.text);
    } else {
      logger.error(output.text);
    }

    process.exitCode = 1;
  }
}
