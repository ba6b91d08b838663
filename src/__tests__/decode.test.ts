import { describe, expect, test } from "vitest";
import { buildIdentifierMapping, decode, parseOnly, restoreIdentifiers, retypeKeywords } from "../decode.js";
import { SchemaError } from "../errors.js";
import { defineField, type FieldOptions } from "../field.js";
import { createMemorySink } from "../logger.js";
import { defineSpec } from "../spec.js";

const field = (options: Partial<FieldOptions> & Pick<FieldOptions, "identifier">) =>
  defineField({ type: "string", cardinality: "one", description: options.identifier, ...options });

describe("decode", () => {
  test("restores reserved punctuation on leaf names", () => {
    const spec = defineSpec(
      field({ identifier: "valid?", type: "bool" }),
      field({ identifier: "claims/verified!", type: "bool" }),
      field({ identifier: "title" }),
    );

    expect(decode('{"valid": true, "claims": {"verified": false}, "title": "x"}', spec)).toEqual({
      "valid?": true,
      claims: { "verified!": false },
      title: "x",
    });
  });

  test("wraps a bare array for a single many-valued field", () => {
    const spec = defineSpec(field({ identifier: "items", cardinality: "many" }));

    expect(decode('["a", "b"]', spec)).toEqual({ items: ["a", "b"] });
    expect(decode('{"items": ["a", "b"]}', spec)).toEqual({ items: ["a", "b"] });
  });

  test("wraps under the field's namespace", () => {
    const spec = defineSpec(field({ identifier: "result/tags?", cardinality: "many" }));

    expect(decode('["x"]', spec)).toEqual({ result: { "tags?": ["x"] } });
  });

  test("leaves bare arrays alone when the spec has several fields", () => {
    const spec = defineSpec(field({ identifier: "items", cardinality: "many" }), field({ identifier: "total", type: "int" }));

    expect(decode("[1, 2]", spec)).toEqual([1, 2]);
  });

  test("keyword fields decode to symbols", () => {
    const spec = defineSpec(
      field({ identifier: "status", type: "keyword" }),
      field({ identifier: "labels", type: "keyword", cardinality: "many" }),
      field({ identifier: "note" }),
    );

    const data = decode('{"status": "active", "labels": ["red", "blue"], "note": "active"}', spec);

    expect(data).toEqual({
      status: Symbol.for("active"),
      labels: [Symbol.for("red"), Symbol.for("blue")],
      note: "active",
    });
  });

  test("keyword fields inside array containers", () => {
    const spec = defineSpec(
      field({ identifier: "tasks", cardinality: "many" }),
      field({ identifier: "tasks/state", type: "keyword" }),
    );

    expect(decode('{"tasks": [{"state": "done"}, {"state": "open"}]}', spec)).toEqual({
      tasks: [{ state: Symbol.for("done") }, { state: Symbol.for("open") }],
    });
  });

  test("key namespace prefixes every key", () => {
    const spec = defineSpec({ keyNamespace: "page" }, field({ identifier: "title" }), field({ identifier: "rank", type: "int" }));

    expect(decode('{"title": "Home", "rank": 1}', spec)).toEqual({ "page/title": "Home", "page/rank": 1 });
  });

  test("union members take their own key namespace from the type discriminator", () => {
    const cat = defineSpec("Cat", { keyNamespace: "cat" }, field({ identifier: "type" }), field({ identifier: "meow", type: "bool" }));
    const dog = defineSpec("Dog", { keyNamespace: "dog" }, field({ identifier: "type" }), field({ identifier: "bark", type: "bool" }));
    const owner = defineSpec(
      { refs: [cat, dog] },
      field({ identifier: "pets", type: "ref", cardinality: "many", refTargets: ["Cat", "Dog"] }),
    );

    expect(decode('{"pets": [{"type": "Cat", "meow": true}, {"type": "Dog", "bark": false}]}', owner)).toEqual({
      pets: [
        { "cat/type": "Cat", "cat/meow": true },
        { "dog/type": "Dog", "dog/bark": false },
      ],
    });
  });

  test("keyword fields declared in union members are retyped", () => {
    const cat = defineSpec("Cat", field({ identifier: "type" }), field({ identifier: "mood", type: "keyword" }));
    const dog = defineSpec("Dog", field({ identifier: "type" }), field({ identifier: "bark", type: "bool" }));
    const owner = defineSpec(
      { refs: [cat, dog] },
      field({ identifier: "pets", type: "ref", cardinality: "many", refTargets: ["Cat", "Dog"] }),
    );

    expect(decode('{"pets": [{"type": "Cat", "mood": "calm"}, {"type": "Dog", "bark": true}]}', owner)).toEqual({
      pets: [
        { type: "Cat", mood: Symbol.for("calm") },
        { type: "Dog", bark: true },
      ],
    });
  });

  test("parser warnings reach the sink", () => {
    const sink = createMemorySink();
    const spec = defineSpec(field({ identifier: "name" }));

    decode('```json\n{"name": "Ada"}\n```', spec, { sink });

    expect(sink.entries[0]).toEqual({
      level: "warn",
      message: "JSON parsing warnings",
      context: { warnings: ["ExtractedFromMarkdown:json"] },
    });
  });

  test("a custom parser replaces the default", () => {
    const spec = defineSpec(field({ identifier: "name" }));
    const data = decode("name=Ada", spec, {
      parser: (text) => ({ value: { name: text.split("=")[1] }, warnings: [] }),
    });

    expect(data).toEqual({ name: "Ada" });
  });

  test("unparsable responses raise", () => {
    const spec = defineSpec(field({ identifier: "name" }));
    expect(() => decode("", spec)).toThrow(SchemaError);
  });
});

describe("decode helpers", () => {
  test("buildIdentifierMapping covers referenced specs", () => {
    const address = defineSpec("Address", field({ identifier: "primary?", type: "bool" }));
    const person = defineSpec(
      { refs: [address] },
      field({ identifier: "home", type: "ref", refTargets: "Address" }),
      field({ identifier: "active!", type: "bool" }),
    );

    expect(Object.fromEntries(buildIdentifierMapping(person))).toEqual({ active: "active!", primary: "primary?" });
  });

  test("restoreIdentifiers walks arrays and nested records", () => {
    const mapping = new Map([["ok", "ok?"]]);
    expect(restoreIdentifiers([{ ok: true, inner: { ok: false } }], mapping)).toEqual([
      { "ok?": true, inner: { "ok?": false } },
    ]);
  });

  test("retypeKeywords only touches named keys", () => {
    expect(retypeKeywords({ kind: "a", other: "b", nested: { kind: "c" } }, new Set(["kind"]))).toEqual({
      kind: Symbol.for("a"),
      other: "b",
      nested: { kind: Symbol.for("c") },
    });
  });

  test("parseOnly skips spec processing", () => {
    expect(parseOnly('["a"]')).toEqual(["a"]);
  });
});
