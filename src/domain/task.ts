/**
 * Task domain model.
 *
 * A TaskRequest is the immutable input of one pipeline run: either an
 * initial build (round 1) or a revision of a previous build (round 2).
 */

/** Phase indicator. */
export enum Round {
  Build = 1,
  Revise = 2,
}

/** Where the bytes of an attachment come from. */
export type AttachmentSource =
  | { kind: 'inline'; dataUri: string }
  | { kind: 'remote'; url: string };

/** An attachment as received, before decoding. */
export interface Attachment {
  name: string;
  /** Declared media type; for inline attachments this comes from the data URI. */
  mediaType?: string;
  source: AttachmentSource;
}

/** A decoded attachment ready to be handed to the generator. */
export interface DecodedAttachment {
  name: string;
  mediaType: string;
  bytes: Buffer;
}

export interface TaskRequest {
  readonly email: string;
  readonly secret: string;
  readonly taskId: string;
  readonly round: Round;
  readonly nonce: string;
  readonly brief: string;
  readonly checks: readonly string[];
  readonly callbackUrl: string;
  readonly attachments: readonly Attachment[];
}

/**
 * Classify an inbound `{ name, url }` pair: `data:` URIs are inline,
 * everything else is treated as a remote locator.
 */
export function toAttachment(name: string, url: string): Attachment {
  if (url.startsWith('data:')) {
    const header = url.slice('data:'.length, url.indexOf(','));
    const mediaType = header.split(';')[0];
    return {
      name,
      mediaType: mediaType || undefined,
      source: { kind: 'inline', dataUri: url },
    };
  }
  return { name, source: { kind: 'remote', url } };
}
