import { describe, expect, test } from "vitest";
import { isSchemaError } from "../errors.js";
import { defineField } from "../field.js";
import { countRefUsages, partitionRefsByUsage } from "../refs.js";
import { buildReferenceRegistry } from "../registry.js";
import { defineSpec } from "../spec.js";

const text = (identifier: string) =>
  defineField({ identifier, type: "string", cardinality: "one", description: identifier });

const ref = (identifier: string, refTargets: string | string[]) =>
  defineField({ identifier, type: "ref", cardinality: "one", description: identifier, refTargets });

describe("buildReferenceRegistry", () => {
  test("flattens nested refs in discovery order", () => {
    const geo = defineSpec("Geo", text("lat"));
    const address = defineSpec("Address", { refs: [geo] }, ref("geo", "Geo"));
    const company = defineSpec("Company", text("title"));
    const person = defineSpec("Person", { refs: [address, company] }, ref("home", "Address"));

    const registry = buildReferenceRegistry(person);

    expect([...registry.keys()]).toEqual(["Address", "Geo", "Company"]);
    expect(registry.get("Geo")).toBe(geo);
  });

  test("spec without refs gives an empty registry", () => {
    expect(buildReferenceRegistry(defineSpec(text("a"))).size).toBe(0);
  });

  test("the same definition listed twice is a clash", () => {
    const geo = defineSpec("Geo", text("lat"));
    const person = defineSpec("Person", { refs: [geo, geo] }, ref("home", "Geo"));

    let caught: unknown;
    try {
      buildReferenceRegistry(person);
    } catch (err) {
      caught = err;
    }
    expect(isSchemaError(caught, "DuplicateSpecName")).toBe(true);
    if (isSchemaError(caught)) {
      expect(caught.message).toBe('Duplicate spec name in refs: "Geo"');
      expect(caught.context.existing).toBe(geo);
      expect(caught.context.duplicate).toBe(geo);
    }
  });

  test("the same definition reached through two refs is a clash", () => {
    const geo = defineSpec("Geo", text("lat"));
    const home = defineSpec("Home", { refs: [geo] }, ref("geo", "Geo"));
    const office = defineSpec("Office", { refs: [geo] }, ref("geo", "Geo"));
    const person = defineSpec("Person", { refs: [home, office] }, ref("home", "Home"));

    expect(() => buildReferenceRegistry(person)).toThrow('Duplicate spec name in refs: "Geo"');
  });

  test("different definitions under one name clash across siblings", () => {
    const geoA = defineSpec("Geo", text("lat"));
    const geoB = defineSpec("Geo", text("lng"));
    const home = defineSpec("Home", { refs: [geoA] }, ref("geo", "Geo"));
    const office = defineSpec("Office", { refs: [geoB] }, ref("geo", "Geo"));
    const person = defineSpec("Person", { refs: [home, office] }, ref("home", "Home"));

    let caught: unknown;
    try {
      buildReferenceRegistry(person);
    } catch (err) {
      caught = err;
    }
    expect(isSchemaError(caught, "DuplicateSpecName")).toBe(true);
    if (isSchemaError(caught)) {
      expect(caught.message).toBe('Duplicate spec name in refs: "Geo"');
      expect(caught.context.specName).toBe("Geo");
      expect(caught.context.existing).toBe(geoA);
      expect(caught.context.duplicate).toBe(geoB);
    }
  });

  test("a direct ref clashing with a nested one", () => {
    const inner = defineSpec("Tag", text("label"));
    const outer = defineSpec("Tag", text("name"));
    const post = defineSpec("Post", { refs: [inner] }, ref("tag", "Tag"));
    const blog = defineSpec("Blog", { refs: [outer, post] }, ref("tag", "Tag"));

    expect(() => buildReferenceRegistry(blog)).toThrow('Duplicate spec name in refs: "Tag"');
  });
});

describe("ref usage", () => {
  const address = defineSpec("Address", text("street"));
  const cat = defineSpec("Cat", text("meow"));
  const dog = defineSpec("Dog", text("bark"));
  const unused = defineSpec("Unused", text("x"));

  test("counts every target, one per union member", () => {
    const person = defineSpec(
      "Person",
      { refs: [address, cat, dog, unused] },
      ref("home", "Address"),
      ref("work", "Address"),
      ref("pet", ["Cat", "Dog"]),
    );
    const counts = countRefUsages(person, buildReferenceRegistry(person));
    expect(Object.fromEntries(counts)).toEqual({ Address: 2, Cat: 1, Dog: 1 });
  });

  test("counts targets inside registered specs", () => {
    const geo = defineSpec("Geo", text("lat"));
    const site = defineSpec("Site", { refs: [geo] }, ref("location", "Geo"), ref("backup", "Geo"));
    const company = defineSpec("Company", { refs: [site] }, ref("hq", "Site"));

    const counts = countRefUsages(company, buildReferenceRegistry(company));
    expect(Object.fromEntries(counts)).toEqual({ Site: 1, Geo: 2 });
  });

  test("partitions into hoisted, inlined and unused", () => {
    const person = defineSpec(
      "Person",
      { refs: [address, cat, unused] },
      ref("home", "Address"),
      ref("work", "Address"),
      ref("pet", "Cat"),
    );
    const { hoisted, inlined, unused: names } = partitionRefsByUsage(person, buildReferenceRegistry(person));
    expect(hoisted).toEqual([address]);
    expect(inlined).toEqual([cat]);
    expect(names).toEqual(["Unused"]);
  });
});
