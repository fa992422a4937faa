/**
 * MathTaxonomy-MCP: Field Projector
 *
 * Projects a problem record onto the text views every detector reads.
 * Missing or malformed members become empty strings; nothing here throws.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { MathRecordSchema } from "../schemas.js";
import type { FieldView, MathRecord } from "../types.js";
import { isPlainObject } from "../utils.js";

/**
 * Coerce an arbitrary JSON value into the typed record view.
 * Non-objects become an empty record.
 */
export function parseRecord(raw: unknown): MathRecord {
  const parsed = MathRecordSchema.safeParse(isPlainObject(raw) ? raw : {});
  return parsed.success ? parsed.data : {};
}

/**
 * Resolve the solution program: the direct `code` field, else the attempt
 * selected by the 1-based `outcome.pass_at_k`.
 */
export function resolveCode(record: MathRecord): string {
  if (record.code) return record.code;

  const attempts = record.attempts ?? [];
  const k = record.outcome?.pass_at_k;
  if (typeof k !== "number" || !Number.isInteger(k) || k < 1 || k > attempts.length) {
    return "";
  }
  return attempts[k - 1]?.code ?? "";
}

function joinNonEmpty(parts: string[]): string {
  return parts.filter(p => p.length > 0).join(" ");
}

/**
 * Build the canonical field views of a record
 */
export function projectFields(record: MathRecord): FieldView {
  const text = record.problem?.text ?? "";
  const plan = record.plan ?? "";
  const code = resolveCode(record);

  return {
    text,
    code,
    plan,
    context: joinNonEmpty([text, plan]),
    everything: joinNonEmpty([text, plan, code]),
  };
}
