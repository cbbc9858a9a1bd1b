/**
 * Attachment codec. Decodes inline base64 data URIs into byte buffers.
 *
 * Decoding is strict: anything that is not canonical base64 is rejected
 * rather than silently truncated, and the decoded size is computed from the
 * encoded length before any bytes are allocated.
 */

import { Result, ok, err } from '../domain/result';
import { DecodedAttachment } from '../domain/task';

export type DecodeErrorKind = 'TooLarge' | 'MalformedEncoding' | 'UnsupportedType' | 'FetchFailed';

export interface DecodeError {
  kind: DecodeErrorKind;
  /** Name of the attachment that failed. */
  attachment: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface CodecOptions {
  /** Ceiling on decoded size in bytes. */
  maxBytes: number;
  /**
   * Accepted media types. Entries ending in "/" match as prefixes
   * ("image/" accepts "image/png"); other entries must match exactly.
   */
  allowedMediaTypes: readonly string[];
}

export const DEFAULT_ALLOWED_MEDIA_TYPES: readonly string[] = [
  'image/',
  'text/',
  'font/',
  'application/json',
  'application/pdf',
  'application/octet-stream',
];

export const DEFAULT_CODEC_OPTIONS: Readonly<CodecOptions> = {
  maxBytes: 5 * 1024 * 1024,
  allowedMediaTypes: DEFAULT_ALLOWED_MEDIA_TYPES,
};

const DATA_URI_PATTERN = /^data:([^,]*),([\s\S]*)$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/** Whether a media type is accepted by the allow-list. */
export function isAllowedMediaType(mediaType: string, allowed: readonly string[]): boolean {
  const normalized = mediaType.toLowerCase();
  return allowed.some((entry) =>
    entry.endsWith('/') ? normalized.startsWith(entry.toLowerCase()) : normalized === entry.toLowerCase(),
  );
}

/** Decoded length of a well-formed base64 string, without decoding it. */
export function decodedLength(base64: string): number {
  const padding = base64.endsWith('==') ? 2 : base64.endsWith('=') ? 1 : 0;
  return (base64.length / 4) * 3 - padding;
}

/**
 * Decode a `data:<type>[;param]*;base64,<payload>` URI.
 *
 * Whitespace inside the payload is ignored; every other deviation from
 * canonical base64 is a MalformedEncoding error.
 */
export function decodeDataUri(
  name: string,
  dataUri: string,
  options: CodecOptions = DEFAULT_CODEC_OPTIONS,
): Result<DecodedAttachment, DecodeError> {
  const match = DATA_URI_PATTERN.exec(dataUri);
  if (!match) {
    return err({ kind: 'UnsupportedType', attachment: name, message: `Attachment "${name}" is not a data URI` });
  }

  const [mediaTypePart, ...params] = match[1].split(';');
  const mediaType = mediaTypePart.trim().toLowerCase();

  if (!mediaType) {
    return err({ kind: 'UnsupportedType', attachment: name, message: `Attachment "${name}" has no media type` });
  }
  if (!isAllowedMediaType(mediaType, options.allowedMediaTypes)) {
    return err({
      kind: 'UnsupportedType',
      attachment: name,
      message: `Attachment "${name}" has unsupported media type ${mediaType}`,
      details: { mediaType },
    });
  }

  const lastParam = params.length > 0 ? params[params.length - 1].trim().toLowerCase() : '';
  if (lastParam !== 'base64') {
    return err({ kind: 'MalformedEncoding', attachment: name, message: `Attachment "${name}" is not base64-encoded` });
  }

  const payload = match[2].replace(/\s+/g, '');
  if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    return err({ kind: 'MalformedEncoding', attachment: name, message: `Attachment "${name}" contains invalid base64` });
  }

  const size = decodedLength(payload);
  if (size > options.maxBytes) {
    return err({
      kind: 'TooLarge',
      attachment: name,
      message: `Attachment "${name}" is ${size} bytes, above the ${options.maxBytes} byte limit`,
      details: { sizeBytes: size, maxBytes: options.maxBytes },
    });
  }

  const bytes = Buffer.from(payload, 'base64');
  // Non-zero trailing bits decode "successfully" to different bytes; reject them.
  if (bytes.toString('base64') !== payload) {
    return err({ kind: 'MalformedEncoding', attachment: name, message: `Attachment "${name}" contains non-canonical base64` });
  }

  return ok({ name, mediaType, bytes });
}

/** Encode bytes as a base64 data URI. */
export function encodeDataUri(mediaType: string, bytes: Buffer): string {
  return `data:${mediaType};base64,${bytes.toString('base64')}`;
}
