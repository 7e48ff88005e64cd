import { confirm } from '@inquirer/prompts';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createCsr } from '../../index.js';
import { parseAlgorithm, selectAlgorithm } from '../utils/algorithms.js';
import { render } from '../logger.js';

export interface CreateCsrOptions {
  domain: string[];
  output?: string;
  algo?: string;
  force?: boolean;
}

/** Generate a private key and a CSR naming the given domains. */
export async function handleCreateCsr(options: CreateCsrOptions): Promise<string[]> {
  const [first] = options.domain;
  if (!first) throw new Error('At least one --domain is required');

  const outputDir = options.output ?? '.';
  const csrPath = join(outputDir, `${first.replace(/\*/g, '_')}.csr`);
  const keyPath = join(outputDir, `${first.replace(/\*/g, '_')}.key`);

  if (!options.force && existsSync(csrPath)) {
    const overwrite = await confirm({
      message: `CSR exists at ${csrPath}. Overwrite?`,
      default: false,
    });
    if (!overwrite) {
      render.info('Cancelled');
      return [];
    }
  }

  const algo = options.algo ? parseAlgorithm(options.algo) : await selectAlgorithm();
  const { pem, privateKeyPem } = await createCsr(options.domain, algo);

  mkdirSync(outputDir, { recursive: true });
  writeFileSync(csrPath, pem);
  writeFileSync(keyPath, privateKeyPem, { mode: 0o600 });
  render.success(`CSR created: ${csrPath}`);
  render.success(`Private key: ${keyPath}`);
  return [csrPath, keyPath];
}
