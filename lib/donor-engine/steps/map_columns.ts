import { SchemaError } from "@/lib/errors";
import { isBlank } from "@/lib/utils";
import { normalizeBirthdate } from "./format";
import {
  CANONICAL_FIELDS,
  type CanonicalField,
  type CanonicalRow,
  type FieldMapping,
  type RawRow,
  type RawValue
} from "../types";

export type ColumnSynonyms = Partial<Record<CanonicalField, string[]>>;

export type FixedSchema = {
  /** Every column the export contract requires, canonical or not. */
  requiredColumns: string[];
  columns: FieldMapping;
};

export interface SchemaMapper {
  readonly mode: "fixed" | "assisted";
  resolve(rawColumns: string[]): FieldMapping;
}

export type SuggestionConfidence = "exact" | "partial" | "fallback";

export type FieldSuggestion = {
  column: string;
  confidence: SuggestionConfidence;
};

export type MappingSuggestion = {
  mapping: FieldMapping;
  suggestions: Partial<Record<CanonicalField, FieldSuggestion>>;
};

export type ColumnPreview = {
  raw: RawValue;
  birthdate: string | null;
};

/** Throws when the mapping cannot key or name a donor. */
export function assertProcessable(mapping: FieldMapping): void {
  const missing: string[] = [];
  if (!mapping.donor_number) missing.push("donor_number");
  if (!mapping.donor_name && !mapping.donor_first) missing.push("donor_name");
  if (!mapping.facility) missing.push("facility");
  if (missing.length > 0) {
    throw new SchemaError(`Unmapped required fields: ${missing.join(", ")}`, { missing });
  }
}

export function createFixedSchemaMapper(schema: FixedSchema): SchemaMapper {
  return {
    mode: "fixed",
    resolve(rawColumns) {
      const present = new Set(rawColumns);
      const missing = schema.requiredColumns.filter((column) => !present.has(column));
      if (missing.length > 0) {
        throw new SchemaError(`Missing required columns: ${missing.join(", ")}`, { missing });
      }

      const mapping: FieldMapping = {};
      for (const field of CANONICAL_FIELDS) {
        const column = schema.columns[field];
        if (column && present.has(column)) {
          mapping[field] = column;
        }
      }
      assertProcessable(mapping);
      return mapping;
    }
  };
}

export function createAssistedMapper(confirmed: FieldMapping): SchemaMapper {
  return {
    mode: "assisted",
    resolve(rawColumns) {
      const present = new Set(rawColumns);
      const unknown = CANONICAL_FIELDS.map((field) => confirmed[field]).filter(
        (column): column is string => column !== undefined && !present.has(column)
      );
      if (unknown.length > 0) {
        throw new SchemaError(`Mapped columns not found in upload: ${unknown.join(", ")}`, { unknown });
      }
      const mapping: FieldMapping = { ...confirmed };
      assertProcessable(mapping);
      return mapping;
    }
  };
}

function normalizeHeader(value: string): string {
  return value.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Proposes a mapping from column names alone. Exact synonym matches are
 * claimed for every field before any substring match is considered, and a
 * field with no match at all gets the first unclaimed column.
 */
export function suggestMapping(
  rawColumns: string[],
  synonyms: ColumnSynonyms,
  fields: readonly CanonicalField[] = CANONICAL_FIELDS
): MappingSuggestion {
  const columns = rawColumns.map((column) => ({ column, key: normalizeHeader(column) }));
  const claimed = new Set<string>();
  const suggestions: Partial<Record<CanonicalField, FieldSuggestion>> = {};

  const claim = (field: CanonicalField, column: string, confidence: SuggestionConfidence) => {
    claimed.add(column);
    suggestions[field] = { column, confidence };
  };

  const passes: Array<{ confidence: SuggestionConfidence; matches: (key: string, synonym: string) => boolean }> = [
    { confidence: "exact", matches: (key, synonym) => key === synonym },
    { confidence: "partial", matches: (key, synonym) => key.includes(synonym) }
  ];

  for (const pass of passes) {
    for (const field of fields) {
      if (suggestions[field]) continue;
      for (const synonym of (synonyms[field] ?? []).map(normalizeHeader)) {
        const match = columns.find((entry) => !claimed.has(entry.column) && pass.matches(entry.key, synonym));
        if (match) {
          claim(field, match.column, pass.confidence);
          break;
        }
      }
    }
  }

  for (const field of fields) {
    if (suggestions[field]) continue;
    const available = columns.find((entry) => !claimed.has(entry.column));
    if (available) {
      claim(field, available.column, "fallback");
    }
  }

  const mapping: FieldMapping = {};
  for (const field of fields) {
    const suggestion = suggestions[field];
    if (suggestion) {
      mapping[field] = suggestion.column;
    }
  }

  return { mapping, suggestions };
}

/** First non-blank values of a column with their normalized birthdate, for operator confirmation. */
export function previewBirthdateColumn(rows: RawRow[], column: string, limit = 5): ColumnPreview[] {
  const preview: ColumnPreview[] = [];
  for (const row of rows) {
    if (preview.length >= limit) break;
    const raw = row[column];
    if (isBlank(raw)) continue;
    preview.push({ raw, birthdate: normalizeBirthdate(raw) });
  }
  return preview;
}

export function mapColumns(rows: RawRow[], mapping: FieldMapping): CanonicalRow[] {
  return rows.map((row) => {
    const mapped: CanonicalRow = {};
    for (const field of CANONICAL_FIELDS) {
      const column = mapping[field];
      if (column === undefined) {
        continue;
      }
      mapped[field] = row[column] ?? null;
    }
    return mapped;
  });
}
