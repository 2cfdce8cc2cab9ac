/**
 * @module @pkbridge/backend-contracts/records
 * Zod schemas for records returned by runtime scripts.
 *
 * Scripts return plain objects; nothing they return is trusted until it
 * has passed one of these schemas.
 */

import { z } from 'zod';
import { Group, Info, groupFromString, infoFromString } from './enums.js';

/**
 * Info name (`installed`, `available`, ...) parsed to {@link Info}
 */
export const infoNameSchema = z.string().transform((value, ctx) => {
  const info = infoFromString(value);
  if (info === Info.UNKNOWN) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown info '${value}'` });
    return z.NEVER;
  }
  return info;
});

/**
 * Group name (`programming`, `admin-tools`, ...) parsed to {@link Group}.
 * Unrecognised names fall back to `OTHER`.
 */
export const groupNameSchema = z.string().transform((value) => {
  const group = groupFromString(value);
  return group === Group.UNKNOWN ? Group.OTHER : group;
});

export const packageRecordSchema = z.object({
  name: z.string().min(1),
  version: z.string(),
  arch: z.string().default(''),
  data: z.string().default(''),
  summary: z.string().default(''),
  info: infoNameSchema.optional(),
});

export const detailsRecordSchema = packageRecordSchema.extend({
  description: z.string().default(''),
  url: z.string().default(''),
  license: z.string().default('unknown'),
  group: groupNameSchema.default('other'),
  size: z.number().int().nonnegative().default(0),
});

export const filesRecordSchema = packageRecordSchema.extend({
  files: z.array(z.string()),
});

export const repoRecordSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(''),
  enabled: z.boolean(),
});

export const updateDetailRecordSchema = packageRecordSchema.extend({
  updates: z.array(z.string()).default([]),
  obsoletes: z.array(z.string()).default([]),
  vendorUrls: z.array(z.string()).default([]),
  bugzillaUrls: z.array(z.string()).default([]),
  cveUrls: z.array(z.string()).default([]),
  updateText: z.string().default(''),
  changelog: z.string().default(''),
  issued: z.string().optional(),
  updated: z.string().optional(),
});

export const downloadRecordSchema = packageRecordSchema.extend({
  files: z.array(z.string()).min(1),
});

export type PackageRecord = z.output<typeof packageRecordSchema>;
export type DetailsRecord = z.output<typeof detailsRecordSchema>;
export type FilesRecord = z.output<typeof filesRecordSchema>;
export type RepoRecord = z.output<typeof repoRecordSchema>;
export type UpdateDetailRecord = z.output<typeof updateDetailRecordSchema>;
export type DownloadRecord = z.output<typeof downloadRecordSchema>;
