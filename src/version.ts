import type { ToolkitConfig } from './types/config.js';
import { Identify } from './tool/identify.js';

export const VERSION = '1.0.6';

const CLI_VERSION = /\d+\.\d+\.\d+(-\d+)?/;

/** Version of the installed GDCM tools, e.g. "3.0.22", or undefined if it cannot be read from the output. */
export async function cliVersion(config?: ToolkitConfig): Promise<string | undefined> {
  const output = await Identify.run((identify) => identify.version(), { config });
  return output.match(CLI_VERSION)?.[0];
}
