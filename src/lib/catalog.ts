import { readFileSync, existsSync } from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { Product } from "../types/index.js";
import { CatalogError, errorMessage } from "./errors.js";

type Column =
  | "id"
  | "name"
  | "category"
  | "price"
  | "material"
  | "color"
  | "features"
  | "targetAudience"
  | "callToAction";

const COLUMN_ALIASES: readonly (readonly [Column, readonly string[]])[] = [
  ["id", ["id", "productid", "product_id", "identifier"]],
  ["name", ["name", "product name", "product_name"]],
  ["category", ["category"]],
  ["price", ["price"]],
  ["material", ["material"]],
  ["color", ["color", "colour"]],
  ["features", ["features", "features/attributes", "attributes"]],
  ["targetAudience", ["target_audience", "target audience", "audience"]],
  ["callToAction", ["call_to_action", "call to action", "cta"]],
];

const HEADER_TO_COLUMN = new Map<string, Column>(
  COLUMN_ALIASES.flatMap(([column, aliases]) => aliases.map((alias): [string, Column] => [alias, column]))
);

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const RowSchema = z.object({
  id: z.string().trim().min(1, "id is required"),
  name: z.string().trim().min(1, "name is required"),
  category: z.string().trim().min(1, "category is required"),
  price: z
    .string()
    .trim()
    .min(1, "price is required")
    .pipe(z.coerce.number().finite().nonnegative()),
  material: optionalText,
  color: optionalText,
  features: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(";")
        .map((feature) => feature.trim())
        .filter((feature) => feature !== "")
    ),
  targetAudience: optionalText,
  callToAction: optionalText,
});

const RecordsSchema = z.array(z.record(z.string()));

function canonicalHeader(header: string): string {
  const key = header.trim().toLowerCase();
  return HEADER_TO_COLUMN.get(key) ?? key;
}

function freezeProduct(row: z.infer<typeof RowSchema>): Product {
  return Object.freeze({
    id: row.id,
    name: row.name,
    category: row.category,
    price: row.price,
    attributes: Object.freeze({
      material: row.material,
      color: row.color,
      features: Object.freeze([...row.features]),
      targetAudience: row.targetAudience,
      callToAction: row.callToAction,
    }),
  });
}

/** Parses catalog CSV text. `source` names the input in error messages. */
export function parseCatalog(content: string, source = "catalog"): Product[] {
  let raw: unknown;
  try {
    raw = parse(content, {
      columns: (headers: string[]) => headers.map(canonicalHeader),
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new CatalogError(`Could not parse ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const rows = RecordsSchema.safeParse(raw);
  if (!rows.success) {
    throw new CatalogError(`Could not read rows from ${source}`);
  }
  const records = rows.data;
  const seen = new Set<string>();

  return records.map((record, index) => {
    const line = index + 2;
    const parsed = RowSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
        .join("; ");
      throw new CatalogError(`Invalid product in ${source} at line ${line}: ${issues}`);
    }
    if (seen.has(parsed.data.id)) {
      throw new CatalogError(`Duplicate product id "${parsed.data.id}" in ${source} at line ${line}`);
    }
    seen.add(parsed.data.id);
    return freezeProduct(parsed.data);
  });
}

export function loadCatalog(path: string): Product[] {
  if (!existsSync(path)) {
    throw new CatalogError(`Catalog file not found: ${path}`);
  }
  return parseCatalog(readFileSync(path, "utf-8"), path);
}

export function findProduct(products: readonly Product[], id: string): Product | null {
  return products.find((product) => product.id === id) ?? null;
}
