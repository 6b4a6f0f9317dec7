/**
 * Nostr identity helpers: npub decoding and signed-event verification.
 */
import { nip19, verifyEvent, type Event } from 'nostr-tools';
import { z } from 'zod';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/schema.js';

const HEX_64 = /^[0-9a-f]{64}$/i;
const HEX_128 = /^[0-9a-f]{128}$/i;

export const SignedEventSchema = z.object({
  id: z.string().regex(HEX_64, 'expected 32-byte hex id'),
  pubkey: z.string().regex(HEX_64, 'expected 32-byte hex pubkey'),
  created_at: z.number().int().nonnegative(),
  kind: z.number().int().nonnegative(),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: z.string().regex(HEX_128, 'expected 64-byte hex signature'),
});

export type SignedEvent = z.infer<typeof SignedEventSchema>;

/**
 * Decode an npub into its hex public key.
 */
export function npubToHex(npub: string): string {
  if (!npub.startsWith('npub1')) {
    throw new ValidationError(
      ErrorCodes.INVALID_NPUB,
      `Invalid npub format, must start with 'npub1': ${npub}`,
      { npub }
    );
  }

  let type: string;
  let data: unknown;
  try {
    ({ type, data } = nip19.decode(npub));
  } catch (error) {
    throw new ValidationError(
      ErrorCodes.INVALID_NPUB,
      `Invalid npub encoding: ${error instanceof Error ? error.message : String(error)}`,
      { npub }
    );
  }

  if (type !== 'npub' || typeof data !== 'string') {
    throw new ValidationError(ErrorCodes.INVALID_NPUB, `Expected an npub, got a ${type}`, { npub });
  }
  return data.toLowerCase();
}

/**
 * Parse a signed event from its JSON text and check its shape.
 * Signature checking is separate: see isValidSignature().
 */
export function parseSignedEvent(json: string): SignedEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(
      ErrorCodes.INVALID_ARGUMENT,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = SignedEventSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(ErrorCodes.INVALID_ARGUMENT, formatZodError(result.error));
  }
  return result.data;
}

/**
 * True when the event id matches its contents and the Schnorr signature
 * verifies against the event pubkey.
 */
export function isValidSignature(event: SignedEvent): boolean {
  const candidate: Event = { ...event };
  try {
    return verifyEvent(candidate);
  } catch {
    // malformed points or signatures make the verifier throw
    return false;
  }
}
