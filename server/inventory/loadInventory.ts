import fs from 'node:fs/promises';
import JSON5 from 'json5';
import { z } from 'zod';
import type { ReferenceEntry } from '../../shared/types';

/** Inventory cells may hold several links separated by newlines or semicolons. */
export const splitEstimateLinks = (cell: string | null | undefined): string[] => {
  if (!cell) return [];
  return cell
    .replace(/;/g, '\n')
    .split(/\r?\n/)
    .map((part) => part.trim())
    .filter(Boolean);
};

export const InventoryRecordSchema = z
  .object({
    identityKey: z.string().trim().min(1).optional(),
    yml_url: z.string().trim().min(1).optional(),
    estimateLinks: z.array(z.string()).optional(),
    estimate_link: z.string().optional(),
  })
  .refine((record) => Boolean(record.identityKey ?? record.yml_url), {
    message: 'identityKey (or yml_url) is required',
  })
  .transform(
    (record): ReferenceEntry => ({
      identityKey: record.identityKey ?? record.yml_url ?? '',
      estimateLinks: [...(record.estimateLinks ?? []), ...splitEstimateLinks(record.estimate_link)],
    }),
  );

// Either a bare array of records or `{ entries: [...] }`.
const InventoryFileSchema = z.preprocess(
  (value) =>
    typeof value === 'object' && value !== null && !Array.isArray(value) && 'entries' in value
      ? value.entries
      : value,
  z.array(InventoryRecordSchema),
);

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length ? `record ${issue.path.join('.')}` : 'inventory'}: ${issue.message}`)
    .join('; ');

export const parseInventory = (text: string): ReferenceEntry[] => {
  let data: unknown;
  try {
    data = JSON5.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Inventory is not valid JSON: ${message}`);
  }

  const parsed = InventoryFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid inventory: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const loadInventory = async (filePath: string): Promise<ReferenceEntry[]> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new Error(`Inventory file not found: ${filePath}`);
    }
    throw error;
  }
  return parseInventory(text);
};
