import { select } from '@inquirer/prompts';
import { listDnsProviders } from '../../index.js';

/** Provider from the flag, or prompt for one. */
export async function resolveProviderName(flag?: string): Promise<string> {
  if (flag) return flag;
  return select({
    message: 'Select DNS provider:',
    choices: listDnsProviders().map((name) => ({ name, value: name })),
  });
}
