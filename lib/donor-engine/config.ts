import { z } from "zod";
import columnSynonyms from "@/config/column-synonyms.json";
import fixedSchema from "@/config/fixed-schema.json";
import invalidEmails from "@/config/invalid-emails.json";
import type { ColumnSynonyms, FixedSchema } from "./steps/map_columns";
import { CANONICAL_FIELDS } from "./types";

const canonicalField = z.enum(CANONICAL_FIELDS);

const synonymsSchema = z.record(canonicalField, z.array(z.string().min(1)));

const fixedSchemaSchema = z.object({
  requiredColumns: z.array(z.string().min(1)),
  columns: z.record(canonicalField, z.string().min(1))
});

const invalidEmailsSchema = z.array(z.string().min(3));

export type EngineConfig = {
  invalidEmails: ReadonlySet<string>;
  synonyms: ColumnSynonyms;
  fixedSchema: FixedSchema;
};

export type EngineConfigInput = {
  invalidEmails?: string[];
  synonyms?: ColumnSynonyms;
  fixedSchema?: FixedSchema;
};

let defaults: EngineConfig | null = null;

/** Engine data shipped under `config/`, validated once. */
export function defaultEngineConfig(): EngineConfig {
  if (defaults) {
    return defaults;
  }
  defaults = createEngineConfig({
    invalidEmails: invalidEmailsSchema.parse(invalidEmails),
    synonyms: synonymsSchema.parse(columnSynonyms),
    fixedSchema: fixedSchemaSchema.parse(fixedSchema)
  });
  return defaults;
}

export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const base = input.invalidEmails && input.synonyms && input.fixedSchema ? null : defaultEngineConfig();
  return {
    invalidEmails: input.invalidEmails
      ? new Set(input.invalidEmails.map((email) => email.trim().toLowerCase()))
      : base?.invalidEmails ?? new Set<string>(),
    synonyms: input.synonyms ?? base?.synonyms ?? {},
    fixedSchema: input.fixedSchema ?? base?.fixedSchema ?? { requiredColumns: [], columns: {} }
  };
}
