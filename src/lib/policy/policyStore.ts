import { getLogger } from '../core/logger.js';
import { loadPolicyFile } from './policyLoader.js';
import type { PolicyDocument } from './policySchema.js';

const log = getLogger('policyStore');

export type PolicySource = () => PolicyDocument;

/**
 * Holds the active policy document.
 *
 * Documents are immutable; a reload builds a complete replacement before
 * swapping the reference, so a request that captured `current()` keeps
 * evaluating against the document it started with. A failed reload leaves
 * the previous document active and rethrows.
 */
export class PolicyStore {
  private document: PolicyDocument;
  private readonly source: PolicySource;

  constructor(source: PolicySource) {
    this.source = source;
    this.document = source();
  }

  static fromFile(policyPath: string): PolicyStore {
    return new PolicyStore(() => loadPolicyFile(policyPath));
  }

  current(): PolicyDocument {
    return this.document;
  }

  reload(): PolicyDocument {
    const previous = this.document.version;
    const next = this.source();
    this.document = next;
    log.info({ previousVersion: previous, version: next.version }, 'policy reloaded');
    return next;
  }
}
