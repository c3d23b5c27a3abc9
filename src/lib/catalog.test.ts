import { describe, test, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { CatalogError } from "./errors.js";
import { findProduct, loadCatalog, parseCatalog } from "./catalog.js";

const HEADER = "id,name,category,price,material,color,features,target_audience,call_to_action";

describe("parseCatalog", () => {
  test("reads products with split features and optional attributes", () => {
    const products = parseCatalog(
      [
        HEADER,
        "P001,Wool Scarf,Accessories,45,merino wool,charcoal,hand-knitted; extra long ;,commuters in cold cities,Order yours today",
        "P002,Plain Mug,Kitchen,9.5,,,,,",
      ].join("\n")
    );

    expect(products).toEqual([
      {
        id: "P001",
        name: "Wool Scarf",
        category: "Accessories",
        price: 45,
        attributes: {
          material: "merino wool",
          color: "charcoal",
          features: ["hand-knitted", "extra long"],
          targetAudience: "commuters in cold cities",
          callToAction: "Order yours today",
        },
      },
      {
        id: "P002",
        name: "Plain Mug",
        category: "Kitchen",
        price: 9.5,
        attributes: {
          material: undefined,
          color: undefined,
          features: [],
          targetAudience: undefined,
          callToAction: undefined,
        },
      },
    ]);
    expect(Object.isFrozen(products[0])).toBe(true);
  });

  test("accepts the legacy column names", () => {
    const products = parseCatalog(
      [
        "ProductID,Product Name,Category,Features/Attributes,Target Audience,Price",
        'P010,Desk Plant,Home,"low maintenance;ceramic pot",plant beginners,19',
      ].join("\n")
    );

    expect(products[0]?.id).toBe("P010");
    expect(products[0]?.name).toBe("Desk Plant");
    expect(products[0]?.attributes.features).toEqual(["low maintenance", "ceramic pot"]);
    expect(products[0]?.attributes.targetAudience).toBe("plant beginners");
    expect(products[0]?.price).toBe(19);
  });

  test("quoted fields may contain commas", () => {
    const products = parseCatalog([HEADER, 'P003,"Mug, Large",Kitchen,12,,,sturdy,,'].join("\n"));
    expect(products[0]?.name).toBe("Mug, Large");
  });

  test("names the line of a row with a bad price", () => {
    expect(() =>
      parseCatalog([HEADER, "P001,Wool Scarf,Accessories,45,,,,,", "P002,Mug,Kitchen,cheap,,,,,"].join("\n"), "test.csv")
    ).toThrow(/^Invalid product in test\.csv at line 3: price:/);
  });

  test("rejects a negative price", () => {
    expect(() => parseCatalog([HEADER, "P001,Wool Scarf,Accessories,-5,,,,,"].join("\n"))).toThrow(CatalogError);
  });

  test("rejects a missing name", () => {
    expect(() => parseCatalog([HEADER, "P001, ,Accessories,5,,,,,"].join("\n"), "test.csv")).toThrow(
      "Invalid product in test.csv at line 2: name: name is required"
    );
  });

  test("rejects duplicate ids", () => {
    expect(() =>
      parseCatalog([HEADER, "P001,A,Cat,1,,,,,", "P001,B,Cat,2,,,,,"].join("\n"), "test.csv")
    ).toThrow('Duplicate product id "P001" in test.csv at line 3');
  });

  test("wraps CSV syntax errors", () => {
    expect(() => parseCatalog([HEADER, 'P001,"unterminated,Cat,1,,,,,'].join("\n"), "test.csv")).toThrow(
      /^Could not parse test\.csv: /
    );
  });

  test("returns an empty list for a header-only file", () => {
    expect(parseCatalog(`${HEADER}\n`)).toEqual([]);
  });
});

describe("loadCatalog", () => {
  test("reads the bundled sample catalog", () => {
    const products = loadCatalog(join(process.cwd(), "data", "products.csv"));
    expect(products).toHaveLength(8);
    expect(findProduct(products, "P001")?.name).toBe("Wool Scarf");
    expect(findProduct(products, "P007")?.attributes.callToAction).toBeUndefined();
  });

  test("reads a file from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "catalog-copy-"));
    try {
      const path = join(dir, "products.csv");
      writeFileSync(path, `${HEADER}\nP001,Wool Scarf,Accessories,45,,,warm,,\n`);
      expect(loadCatalog(path).map((p) => p.id)).toEqual(["P001"]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("fails for a missing file", () => {
    expect(() => loadCatalog("/nonexistent/products.csv")).toThrow(
      "Catalog file not found: /nonexistent/products.csv"
    );
  });
});

describe("findProduct", () => {
  test("returns null for an unknown id", () => {
    expect(findProduct([], "P404")).toBeNull();
  });
});
