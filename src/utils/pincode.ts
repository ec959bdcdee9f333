import { fail, ok, ServiceResult } from "../types/result";

export type PincodeMatch = boolean | "not_checked";

// Exactly six digits, not embedded in a longer run of digits.
const SERVICEABLE_PINCODE = /(?<!\d)\d{6}(?!\d)/g;

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Pincodes a vendor delivers to, read from whatever is stored in the
 * vendor's pincode field. Tokens that are not exactly six digits are ignored
 * so that a badly saved value simply never matches.
 */
export function extractServiceablePincodes(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }
  return dedupe(raw.match(SERVICEABLE_PINCODE) ?? []);
}

export function matchPincode(
  raw: string | null | undefined,
  candidate: string | null | undefined
): PincodeMatch {
  const pincode = candidate?.trim() ?? "";
  if (!pincode) {
    return "not_checked";
  }
  return extractServiceablePincodes(raw).includes(pincode);
}

/**
 * Strict variant used when a vendor saves their profile: every digit run
 * must be a six digit pincode. Returns the canonical "560001, 560034" form.
 */
export function normalizeVendorPincodes(raw: string): ServiceResult<string> {
  const chunks = raw.match(/\d+/g) ?? [];

  if (chunks.some((chunk) => chunk.length !== 6)) {
    return fail("ValidationError", "Each pincode must be exactly 6 digits.");
  }

  const pincodes = dedupe(chunks);
  if (pincodes.length === 0) {
    return fail("ValidationError", "Please enter at least one valid 6-digit pincode.");
  }

  return ok(pincodes.join(", "));
}
