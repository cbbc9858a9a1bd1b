/**
 * Resolve a request's attachments: inline data URIs through the codec,
 * remote locators through the fetcher. Order is preserved; failures are
 * collected per attachment.
 */

import { Attachment, DecodedAttachment } from '../domain/task';
import { decodeDataUri, DecodeError } from './codec';
import { fetchAttachment, FetcherOptions } from './fetcher';

export interface ResolvedAttachments {
  decoded: DecodedAttachment[];
  failures: DecodeError[];
}

export async function resolveAttachments(
  attachments: readonly Attachment[],
  options: FetcherOptions,
): Promise<ResolvedAttachments> {
  const results = await Promise.all(
    attachments.map((attachment) =>
      attachment.source.kind === 'inline'
        ? Promise.resolve(decodeDataUri(attachment.name, attachment.source.dataUri, options))
        : fetchAttachment(attachment.name, attachment.source.url, options),
    ),
  );

  const decoded: DecodedAttachment[] = [];
  const failures: DecodeError[] = [];
  for (const result of results) {
    if (result.ok) {
      decoded.push(result.value);
    } else {
      failures.push(result.error);
    }
  }
  return { decoded, failures };
}
