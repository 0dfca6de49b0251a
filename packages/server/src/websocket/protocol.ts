/**
 * Inbound frame validation.
 */

import { z } from 'zod';
import {
  ClientEventType,
  ConnectionRole,
  parseRole,
} from '@scanlink/shared';
import type { IdentityCredentials } from '../identity/identity-resolver.js';

/** Scanners send ids as numbers or as numeric strings; both must be exact. */
const numericId = z.union([
  z.number().int().refine(Number.isSafeInteger, 'Id is out of range'),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/)
    .transform((value) => parseInt(value, 10))
    .refine(Number.isSafeInteger, 'Id is out of range'),
]);

export const registerSchema = z.object({
  type: z.literal(ClientEventType.REGISTER),
  token: z.string().min(1).optional(),
  login: z.string().trim().min(1).optional(),
  role: z.union([z.string(), z.number()]).optional(),
  is_input: z.boolean().optional(),
});

export const newPairingSchema = z.object({
  type: z.literal(ClientEventType.NEW_PAIRING),
  platform: numericId,
  product: numericId.nullable().optional(),
});

export interface Registration {
  credentials: IdentityCredentials;
  role: ConnectionRole;
}

export interface PairingRequest {
  platform: number;
  product: number | null;
}

/** Decode a text frame. Returns undefined for anything that is not JSON. */
export function decodeFrame(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** The `type` field of a decoded frame, if it has one. */
export function frameType(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('type' in payload)) return undefined;
  return typeof payload.type === 'string' ? payload.type : undefined;
}

/**
 * Validate a registration frame.
 * An explicit role wins over the legacy `is_input` flag; neither means None.
 */
export function parseRegistration(payload: unknown): Registration | null {
  const result = registerSchema.safeParse(payload);
  if (!result.success) return null;
  const { token, login, role, is_input } = result.data;

  let parsedRole: ConnectionRole | null;
  if (role !== undefined) {
    parsedRole = parseRole(role);
  } else if (is_input !== undefined) {
    parsedRole = is_input ? ConnectionRole.Writer : ConnectionRole.Reader;
  } else {
    parsedRole = ConnectionRole.None;
  }
  if (parsedRole === null) return null;

  return { credentials: { token, login }, role: parsedRole };
}

export function parsePairingRequest(payload: unknown): PairingRequest | null {
  const result = newPairingSchema.safeParse(payload);
  if (!result.success) return null;
  return { platform: result.data.platform, product: result.data.product ?? null };
}
