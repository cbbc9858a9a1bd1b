/**
 * Remote attachment fetcher.
 *
 * Resolves attachments supplied as an http(s) locator rather than inline
 * bytes. The same size ceiling and media-type allow-list as the codec apply;
 * the body is read incrementally and abandoned as soon as it passes the
 * ceiling.
 */

import { Result, ok, err } from '../domain/result';
import { DecodedAttachment } from '../domain/task';
import { validatePublicUrl } from '../security/url-guard';
import { CodecOptions, DecodeError, DEFAULT_CODEC_OPTIONS, isAllowedMediaType } from './codec';

/** Fetch function type (injectable for testing). */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface FetcherOptions extends CodecOptions {
  timeoutMs: number;
  /** Skip the private-network guard (local development only). */
  allowPrivateHosts: boolean;
  fetchFn?: FetchFn;
}

export const DEFAULT_FETCHER_OPTIONS: Readonly<FetcherOptions> = {
  ...DEFAULT_CODEC_OPTIONS,
  timeoutMs: 15_000,
  allowPrivateHosts: false,
};

async function readBounded(response: Response, maxBytes: number): Promise<Buffer | null> {
  if (!response.body) return Buffer.alloc(0);
  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;

  for (;;) {
    const chunk = await reader.read();
    if (chunk.done) break;
    total += chunk.value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(Buffer.from(chunk.value));
  }

  return Buffer.concat(chunks);
}

/** Release the connection behind a response whose body will not be read. */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) await response.body.cancel();
}

/** Download an attachment from a remote locator. */
export async function fetchAttachment(
  name: string,
  url: string,
  options: FetcherOptions = DEFAULT_FETCHER_OPTIONS,
): Promise<Result<DecodedAttachment, DecodeError>> {
  if (!options.allowPrivateHosts) {
    const urlError = validatePublicUrl(url);
    if (urlError) {
      return err({ kind: 'UnsupportedType', attachment: name, message: `Attachment "${name}": ${urlError}` });
    }
  }

  const fetchFn: FetchFn = options.fetchFn ?? ((target, init) => fetch(target, init));
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchFn(url, { method: 'GET', signal: controller.signal });

    if (!response.ok) {
      await discardBody(response);
      return err({
        kind: 'FetchFailed',
        attachment: name,
        message: `Attachment "${name}" could not be downloaded (HTTP ${response.status})`,
        details: { statusCode: response.status },
      });
    }

    const declaredLength = Number(response.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declaredLength) && declaredLength > options.maxBytes) {
      await discardBody(response);
      return err({
        kind: 'TooLarge',
        attachment: name,
        message: `Attachment "${name}" is ${declaredLength} bytes, above the ${options.maxBytes} byte limit`,
        details: { sizeBytes: declaredLength, maxBytes: options.maxBytes },
      });
    }

    const contentType = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
    const mediaType = contentType || 'application/octet-stream';
    if (!isAllowedMediaType(mediaType, options.allowedMediaTypes)) {
      await discardBody(response);
      return err({
        kind: 'UnsupportedType',
        attachment: name,
        message: `Attachment "${name}" has unsupported media type ${mediaType}`,
        details: { mediaType },
      });
    }

    const bytes = await readBounded(response, options.maxBytes);
    if (bytes === null) {
      return err({
        kind: 'TooLarge',
        attachment: name,
        message: `Attachment "${name}" exceeds the ${options.maxBytes} byte limit`,
        details: { maxBytes: options.maxBytes },
      });
    }

    return ok({ name, mediaType, bytes });
  } catch (error) {
    const aborted = controller.signal.aborted;
    return err({
      kind: 'FetchFailed',
      attachment: name,
      message: aborted
        ? `Attachment "${name}" download timed out after ${options.timeoutMs}ms`
        : `Attachment "${name}" could not be downloaded`,
      details: { cause: error instanceof Error ? error.message : 'unknown error' },
    });
  } finally {
    clearTimeout(timeout);
  }
}
