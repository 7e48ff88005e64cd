import { posix } from 'path';
import { CERTIFICATES_DIR } from '../constants/defaults.js';
import { CertificateRetrievalError } from '../errors/errors.js';
import type { ExecutionBackend } from '../runtime/execution-backend.js';
import type { CertificateChain } from '../types/request.js';

/** PEM blocks separated by blank lines, trimmed, empties dropped. */
export function splitPemChain(text: string): string[] {
  return text
    .split(/\r?\n[ \t]*\r?\n/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0);
}

/**
 * Leaf is the first block, CA the last; the published chain runs root to leaf.
 */
export function buildCertificateChain(blocks: string[]): CertificateChain {
  if (blocks.length === 0) throw new Error('A certificate chain needs at least one block');
  return {
    blocks: [...blocks],
    leaf: blocks[0],
    ca: blocks[blocks.length - 1],
    chain: [...blocks].reverse(),
  };
}

/**
 * Reads the chain lego wrote for a subject, `<certsDir>/<subject>.crt`.
 */
export class CertificateRetriever {
  constructor(
    private readonly backend: ExecutionBackend,
    readonly certsDir: string = CERTIFICATES_DIR,
  ) {}

  /** lego stores wildcard names with `*` replaced by `_`. */
  pathFor(subject: string): string {
    return posix.join(this.certsDir, `${subject.replace(/\*/g, '_')}.crt`);
  }

  /**
   * @throws CertificateRetrievalError when the file is missing or holds no block
   */
  async fetch(subject: string): Promise<CertificateChain> {
    const path = this.pathFor(subject);

    let text: string;
    try {
      text = await this.backend.pull(path);
    } catch (e) {
      throw CertificateRetrievalError.missing(subject, path, e);
    }

    const blocks = splitPemChain(text);
    if (blocks.length === 0) throw CertificateRetrievalError.empty(subject, path);
    return buildCertificateChain(blocks);
  }
}
