import { Command } from 'commander';
import pkg from '../../package.json';
import { handleError } from './utils/errors.js';
import { handleCreateCsr } from './commands/create-csr.js';
import { handleIssueCommand } from './commands/issue.js';
import { handleProvidersCommand } from './commands/providers.js';
import { handleValidateCommand } from './commands/validate.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Build a Commander program instance for the acme-dns01 CLI. */
export function createCli(): Command {
  const program = new Command();

  program
    .name('acme-dns01')
    .description('Issue certificates for CSRs through lego DNS-01 challenges')
    .version(pkg.version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.ACME_DNS01_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.ACME_DNS01_CLI_TEST) return;
    process.exit(1);
  }

  program
    .command('providers')
    .description('List supported DNS providers and their options')
    .action(async () => {
      try {
        await handleProvidersCommand();
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('validate')
    .description('Validate ACME and provider configuration')
    .option('-p, --provider <name>', 'DNS provider (see `providers`)')
    .option('-c, --config <path>', 'JSON file with unit configuration')
    .option('-e, --email <email>', 'ACME account contact email')
    .option('--server <url>', 'ACME directory URL')
    .option('--staging', "Use Let's Encrypt staging environment")
    .option('--production', "Use Let's Encrypt production environment")
    .action(async (opts) => {
      try {
        await handleValidateCommand({
          provider: opts.provider,
          config: opts.config,
          email: opts.email,
          server: opts.server,
          staging: opts.staging,
          production: opts.production,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('issue')
    .description('Obtain a certificate for a CSR with lego')
    .requiredOption('--csr <path>', 'PEM certificate signing request')
    .option('-p, --provider <name>', 'DNS provider (see `providers`)')
    .option('-c, --config <path>', 'JSON file with unit configuration')
    .option('-e, --email <email>', 'ACME account contact email')
    .option('--server <url>', 'ACME directory URL')
    .option('--staging', "Use Let's Encrypt staging environment")
    .option('--production', "Use Let's Encrypt production environment")
    .option('--relation-id <id>', 'Correlation id for the published files', 'local')
    .option('-o, --output <path>', 'Output directory for certificates', './certificates')
    .option('--lego <path>', 'lego binary')
    .option('--certs-dir <path>', 'Directory lego writes certificates to')
    .option('--csr-path <path>', 'Where the CSR is staged for lego')
    .option('--timeout <seconds>', 'lego timeout in seconds')
    .action(async (opts) => {
      try {
        await handleIssueCommand({
          csr: opts.csr,
          provider: opts.provider,
          config: opts.config,
          email: opts.email,
          server: opts.server,
          staging: opts.staging,
          production: opts.production,
          relationId: opts.relationId,
          output: opts.output,
          lego: opts.lego,
          certsDir: opts.certsDir,
          csrPath: opts.csrPath,
          timeout: opts.timeout,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('create-csr')
    .description('Generate a private key and CSR for testing')
    .option('-d, --domain <domain>', 'Domain name (repeatable)', collect, [])
    .option('-o, --output <path>', 'Output directory', '.')
    .option('--algo <algo>', 'Key algorithm (ec-p256, ec-p384, rsa-2048, ...)')
    .option('--force', 'Overwrite existing files')
    .action(async (opts) => {
      try {
        await handleCreateCsr({
          domain: opts.domain,
          output: opts.output,
          algo: opts.algo,
          force: opts.force,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'commander.helpDisplayed' && code !== 'commander.version') throw err;
  }
  return program;
}
