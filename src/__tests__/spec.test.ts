import { describe, expect, test } from "vitest";
import { isSchemaError, type SchemaError } from "../errors.js";
import { defineField } from "../field.js";
import { defineSpec } from "../spec.js";

function specError(build: () => unknown): SchemaError {
  try {
    build();
  } catch (err) {
    if (isSchemaError(err)) return err;
    throw err;
  }
  throw new Error("expected defineSpec to throw");
}

const street = defineField({ identifier: "street", type: "string", cardinality: "one", description: "Street" });
const city = defineField({ identifier: "city", type: "string", cardinality: "one", description: "City" });
const home = defineField({
  identifier: "home",
  type: "ref",
  cardinality: "one",
  description: "Home address",
  refTargets: "Address",
});

describe("defineSpec", () => {
  test("anonymous spec", () => {
    const spec = defineSpec(street, city);
    expect(spec.name).toBeUndefined();
    expect(spec.fields).toEqual([street, city]);
  });

  test("named spec", () => {
    const spec = defineSpec("Address", street, city);
    expect(spec.name).toBe("Address");
    expect(spec.fields).toHaveLength(2);
  });

  test("named spec with refs and key namespace", () => {
    const address = defineSpec("Address", street, city);
    const person = defineSpec("Person", { refs: [address], keyNamespace: "crm.person" }, home);
    expect(person.refs).toEqual([address]);
    expect(person.keyNamespace).toBe("crm.person");
    expect(Object.isFrozen(person)).toBe(true);
  });

  test("options without a name", () => {
    const spec = defineSpec({ keyNamespace: "page" }, street);
    expect(spec.name).toBeUndefined();
    expect(spec.keyNamespace).toBe("page");
  });

  test("ref field targeting an unregistered spec", () => {
    const err = specError(() => defineSpec("Person", home));
    expect(err.kind).toBe("InvalidSpec");
    expect(err.message).toBe('Field "home" references target "Address" but no ref with that name exists');
    expect(err.context).toMatchObject({ availableRefs: [] });
  });

  test("only directly declared refs are valid targets", () => {
    const address = defineSpec("Address", street);
    const office = defineSpec("Office", { refs: [address] }, home);
    const err = specError(() => defineSpec("Person", { refs: [office] }, home));
    expect(err.context).toMatchObject({ target: "Address", availableRefs: ["Office"] });
  });

  test("unnamed ref", () => {
    const err = specError(() => defineSpec({ refs: [defineSpec(street)] }, street));
    expect(err.kind).toBe("InvalidSpec");
    expect(err.message).toBe("Referenced specs must be named");
  });

  test("empty key namespace", () => {
    const err = specError(() => defineSpec({ keyNamespace: "" }, street));
    expect(err.message).toBe("Spec keyNamespace must not be empty");
    expect(err.hint).toBe("Spec options take only refs (an array of specs) and keyNamespace (a non-empty string)");
  });

  test("empty name", () => {
    const err = specError(() => defineSpec("", street));
    expect(err.message).toBe("Spec name must not be empty");
    expect(err.hint).toBe("Give the spec a name, or leave the name out for an anonymous spec");
  });
});
