import { PhotoFormatEnum, type PhotoFormat } from "@civic-registry/shared";
import type { Actor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { NotFoundError, ValidationError, parseInput } from "./errors";
import { requireIdentity, requireIdentityFor } from "./identities";
import { parsePositiveIntEnv } from "./runtime-safety";
import { getRegistryStore } from "./store";
import type { BiometricRow, RegistryTx } from "./store/types";

export const DEFAULT_PHOTO_MAX_BYTES = 2 * 1024 * 1024;

export interface Biometric {
  nationalId: string;
  hasPhoto: boolean;
  photoType: PhotoFormat | null;
  version: number;
  createdOn: string;
  lastUpdatedOn: string;
  photo?: Buffer;
}

// Leading bytes of each accepted format.
const SIGNATURES: Record<PhotoFormat, number[]> = {
  jpg: [0xff, 0xd8, 0xff],
  png: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
};

export function photoMaxBytes(): number {
  return parsePositiveIntEnv(process.env.PHOTO_MAX_BYTES, DEFAULT_PHOTO_MAX_BYTES);
}

function matchesSignature(bytes: Buffer, format: PhotoFormat): boolean {
  const signature = SIGNATURES[format];
  return bytes.length >= signature.length && signature.every((byte, index) => bytes[index] === byte);
}

export function toBiometric(row: BiometricRow, includePhoto = false): Biometric {
  const view: Biometric = {
    nationalId: row.national_id,
    hasPhoto: row.has_photo,
    photoType: row.photo_type,
    version: row.version,
    createdOn: row.created_on.toISOString(),
    lastUpdatedOn: row.last_updated_on.toISOString(),
  };
  if (includePhoto && row.photo) view.photo = row.photo;
  return view;
}

async function requireBiometric(tx: RegistryTx, nationalId: string): Promise<BiometricRow> {
  await requireIdentity(tx, nationalId);
  const row = await tx.findBiometric(nationalId);
  if (!row) {
    throw new NotFoundError("BIOMETRIC_NOT_FOUND", `No biometric record for national ID ${nationalId}`);
  }
  return row;
}

export async function getBiometric(nationalId: string, options: { includePhoto?: boolean } = {}): Promise<Biometric> {
  const row = await getRegistryStore().transaction((tx) => requireBiometric(tx, nationalId), { readOnly: true });
  return toBiometric(row, options.includePhoto);
}

/** Replaces the photo and bumps the version. */
export async function storePhoto(
  nationalId: string,
  bytes: Buffer,
  rawFormat: string,
  actor: Actor
): Promise<Biometric> {
  const format = parseInput(PhotoFormatEnum, rawFormat);
  if (bytes.length === 0) {
    throw new ValidationError("PHOTO_EMPTY", "Photo must not be empty");
  }
  const limit = photoMaxBytes();
  if (bytes.length > limit) {
    throw new ValidationError("PHOTO_TOO_LARGE", `Photo exceeds the ${limit}-byte limit`, {
      size: bytes.length,
      limit,
    });
  }
  if (!matchesSignature(bytes, format)) {
    throw new ValidationError("PHOTO_FORMAT_MISMATCH", `Photo content is not a ${format} image`);
  }

  const row = await getRegistryStore().transaction(async (tx) => {
    await requireIdentityFor(tx, actor, nationalId);
    await requireBiometric(tx, nationalId);
    const updated = await tx.updateBiometricPhoto(nationalId, bytes, format);
    if (!updated) {
      throw new NotFoundError("BIOMETRIC_NOT_FOUND", `No biometric record for national ID ${nationalId}`);
    }
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPLOAD_PHOTO,
      table: "biometric",
      recordId: nationalId,
      details: `Stored ${format} photo (${bytes.length} bytes), version ${updated.version}`,
    });
    return updated;
  });
  return toBiometric(row);
}
