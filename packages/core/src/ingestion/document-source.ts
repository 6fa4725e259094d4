import type { DocumentInput, SourceDocument } from '@factsift/shared/src/types/document.types.js';
import { sha256 } from '@factsift/shared/src/utils/hash.js';

export const UNKNOWN_DOMAIN = 'unknown';

interface DocumentLocation {
  readonly domain: string;
  readonly path: string;
}

/**
 * Accepts `https://host/path`, `host.tld/path` and bare `host.tld` ids.
 * Anything else lands in the `unknown` domain with the id as its path.
 */
export function locateDocument(documentId: string): DocumentLocation {
  if (documentId.startsWith('http://') || documentId.startsWith('https://')) {
    const url = new URL(documentId);
    return { domain: url.host.toLowerCase(), path: url.pathname };
  }

  const slash = documentId.indexOf('/');
  if (slash > 0) {
    const head = documentId.slice(0, slash);
    if (head.includes('.')) {
      return { domain: head.toLowerCase(), path: documentId.slice(slash + 1) };
    }
  }

  if (slash === -1 && documentId.includes('.')) {
    return { domain: documentId.toLowerCase(), path: '' };
  }

  return { domain: UNKNOWN_DOMAIN, path: documentId };
}

export function toSourceDocument(input: DocumentInput): SourceDocument {
  const location = locateDocument(input.documentId);
  return {
    documentId: input.documentId,
    sourceText: input.sourceText,
    metadata: {
      domain: input.domain?.toLowerCase() ?? location.domain,
      path: input.path ?? location.path,
      contentHash: sha256(input.sourceText),
    },
  };
}
