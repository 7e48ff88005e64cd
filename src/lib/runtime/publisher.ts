import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ConfigError } from '../errors/errors.js';
import type { Publication } from '../types/request.js';

/** Provider side of the certificates relation. */
export interface CertificatePublisher {
  publish(publication: Publication): Promise<void>;
}

/** Latest publication per correlation id. */
export class InMemoryPublisher implements CertificatePublisher {
  readonly published: Publication[] = [];
  private readonly byCorrelationId = new Map<string, Publication>();

  async publish(publication: Publication): Promise<void> {
    this.published.push(publication);
    this.byCorrelationId.set(publication.correlationId, publication);
  }

  get(correlationId: string): Publication | undefined {
    return this.byCorrelationId.get(correlationId);
  }
}

/**
 * Writes `certificate.pem`, `ca.pem` and `chain.pem` (root to leaf) into
 * `<outputDir>/<correlationId>/`.
 */
export class FileCertificatePublisher implements CertificatePublisher {
  readonly written: string[] = [];

  constructor(private readonly outputDir: string) {}

  /** Output directory of one relation; ids that would escape `outputDir` are rejected. */
  directoryFor(correlationId: string): string {
    if (
      correlationId === '' ||
      correlationId === '.' ||
      correlationId.includes('..') ||
      /[\\/]/.test(correlationId)
    ) {
      throw ConfigError.invalidRelationId(correlationId);
    }
    return join(this.outputDir, correlationId);
  }

  async publish(publication: Publication): Promise<void> {
    const dir = this.directoryFor(publication.correlationId);
    await mkdir(dir, { recursive: true });

    const files: Array<[string, string]> = [
      ['certificate.pem', publication.certificate],
      ['ca.pem', publication.ca],
      ['chain.pem', publication.chain.join('\n')],
    ];
    for (const [name, pem] of files) {
      const path = join(dir, name);
      await writeFile(path, pem.endsWith('\n') ? pem : `${pem}\n`, 'utf-8');
      this.written.push(path);
    }
  }
}
