import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isSchemaError } from "../errors.js";
import { loadSpecDocument, parseSpecDocument } from "../loader.js";
import { renderSpec } from "../render.js";

function caught(build: () => unknown): unknown {
  try {
    build();
  } catch (err) {
    return err;
  }
  return undefined;
}

const PERSON = {
  name: "Person",
  key_namespace: "crm",
  refs: [
    {
      name: "Address",
      fields: [{ identifier: "city", type: "string", cardinality: "one", description: "City" }],
    },
  ],
  fields: [
    { identifier: "home", type: "ref", cardinality: "one", description: "Home", ref_targets: "Address" },
    {
      identifier: "role",
      type: "keyword",
      cardinality: "one",
      description: "Role",
      enum: { admin: "Administrator" },
      optional: true,
    },
  ],
};

describe("parseSpecDocument", () => {
  test("builds the spec with its refs", () => {
    const spec = parseSpecDocument(PERSON);

    expect(spec.name).toBe("Person");
    expect(spec.keyNamespace).toBe("crm");
    expect(spec.refs?.[0]?.name).toBe("Address");
    expect(spec.fields[0]?.refTargets).toEqual({ kind: "single", name: "Address" });
    expect(spec.fields[1]?.enumValues).toEqual({ admin: "Administrator" });
    expect(renderSpec(spec)).toBe(
      [
        "{",
        "  // City (required)",
        "  city: string,",
        "}",
        "",
        "Person {",
        "  // Home (required)",
        "  home: Address,",
        "  // Role (optional)",
        '  //   - "admin": Administrator',
        '  role: "admin" or null,',
        "}",
      ].join("\n"),
    );
  });

  test("shape errors are reported as InvalidSpec", () => {
    const err = caught(() => parseSpecDocument({ fields: [{ identifier: "x", type: "string" }] }));

    expect(isSchemaError(err, "InvalidSpec")).toBe(true);
    if (isSchemaError(err)) {
      expect(err.message).toBe(
        'Invalid spec document: fields.0.cardinality: Field cardinality must be "one" or "many"; fields.0.description: Required',
      );
    }
  });

  test("unknown type notation is an InvalidField", () => {
    const err = caught(() =>
      parseSpecDocument({ fields: [{ identifier: "x", type: "money", cardinality: "one", description: "X" }] }),
    );

    expect(isSchemaError(err, "InvalidField")).toBe(true);
  });

  test("construction rules still apply", () => {
    const err = caught(() =>
      parseSpecDocument({
        fields: [{ identifier: "home", type: "ref", cardinality: "one", description: "Home", ref_targets: "Nowhere" }],
      }),
    );

    expect(isSchemaError(err, "InvalidSpec")).toBe(true);
  });
});

describe("loadSpecDocument", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "schemacast-loader-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("reads a spec from disk", () => {
    const path = join(tempDir, "person.json");
    writeFileSync(path, JSON.stringify(PERSON));

    expect(loadSpecDocument(path).name).toBe("Person");
  });

  test("malformed JSON is an InvalidSpec", () => {
    const path = join(tempDir, "broken.json");
    writeFileSync(path, "{ not json");

    const err = caught(() => loadSpecDocument(path));
    expect(isSchemaError(err, "InvalidSpec")).toBe(true);
    if (isSchemaError(err)) {
      expect(err.message.startsWith(`Could not read spec document ${path}: `)).toBe(true);
    }
  });

  test("missing file is an InvalidSpec", () => {
    const err = caught(() => loadSpecDocument(join(tempDir, "missing.json")));
    expect(isSchemaError(err, "InvalidSpec")).toBe(true);
  });
});
