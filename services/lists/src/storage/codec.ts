import { z } from 'zod';
import type { CollectionRecord, RecordId } from '../types';

/** Version tag written into every blob; anything else is treated as undecodable. */
export const BLOB_FORMAT = 1;

/** A record schema whose input side is left open so defaults may fill in fields. */
export type RecordSchema<T extends CollectionRecord> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type EncodeResult = { ok: true; blob: string } | { ok: false; detail: string };

export type DecodeResult<T> = { ok: true; records: T[] } | { ok: false; detail: string };

const envelopeSchema = z.object({
  format: z.number(),
  records: z.array(z.unknown()),
});

export function encodeCollection<T extends CollectionRecord>(
  schema: RecordSchema<T>,
  records: readonly T[],
): EncodeResult {
  const checked = checkRecords(schema, records);
  if (!checked.ok) return checked;

  try {
    return { ok: true, blob: JSON.stringify({ format: BLOB_FORMAT, records: checked.records }) };
  } catch (err) {
    return { ok: false, detail: err instanceof Error ? err.message : String(err) };
  }
}

export function decodeCollection<T extends CollectionRecord>(
  schema: RecordSchema<T>,
  raw: string,
): DecodeResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, detail: `invalid JSON: ${message}` };
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { ok: false, detail: 'missing collection envelope' };
  }
  if (envelope.data.format !== BLOB_FORMAT) {
    return { ok: false, detail: `unsupported format ${envelope.data.format}` };
  }

  return checkRecords(schema, envelope.data.records);
}

function checkRecords<T extends CollectionRecord>(
  schema: RecordSchema<T>,
  input: readonly unknown[],
): DecodeResult<T> {
  const seen = new Set<RecordId>();
  const records: T[] = [];

  for (const [index, candidate] of input.entries()) {
    const parsed = schema.safeParse(candidate);
    if (!parsed.success) {
      return { ok: false, detail: `record ${index}: ${describeIssues(parsed.error)}` };
    }
    const { id } = parsed.data;
    if (seen.has(id)) {
      return { ok: false, detail: `duplicate id ${id}` };
    }
    seen.add(id);
    records.push(parsed.data);
  }

  return { ok: true, records };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
