import { describe, expect, it } from "vitest";
import { IDRef } from "../../idref";
import { MemoryHost, type MemoryEntity } from "../../__tests__/memory_host";
import {
  IDREF_ERROR,
  IDRefError,
  ValidationError,
} from "../../utils/error";
import { silent_logger } from "../../utils/logger";

function setup() {
  const host = new MemoryHost();
  const scene = host.add_scene("Scene");
  const refs = new IDRef(host, { logger: silent_logger });
  const Target = refs.define_reference({
    key: "target",
    display_name: "Target",
    validator: (e: MemoryEntity) => e.type === "mesh",
  });
  const owner = host.create(scene, "Owner", { type: "empty" });
  return { host, scene, refs, Target, owner };
}

describe("ReferenceField", () => {
  //=========================================================
  // get / set
  //=========================================================

  it("stores the target's id under <key>_id and reads the target back", () => {
    const { host, scene, refs, Target, owner } = setup();
    const a = host.create(scene, "A");

    Target.set(owner, a);

    expect(Target.value_key).toBe("target_id");
    expect(host.read_field(owner, "target_id")).toBe(refs.peek_id(a));
    expect(Target.get(owner)).toBe(a);
  });

  it("assigns the target an id on first reference", () => {
    const { host, scene, refs, Target, owner } = setup();
    const a = host.create(scene, "A");
    expect(refs.peek_id(a)).toBeUndefined();

    Target.set(owner, a);

    expect(refs.peek_id(a)).toBe(1);
    expect(Target.peek(owner)).toBe(1);
  });

  it("reads an empty field as unresolved", () => {
    const { Target, owner } = setup();
    expect(Target.peek(owner)).toBeUndefined();
    expect(Target.get(owner)).toBeUndefined();
    expect(Target.get_name(owner)).toBe("");
  });

  it("reads a deleted target as unresolved", () => {
    const { host, scene, Target, owner } = setup();
    const a = host.create(scene, "A");
    Target.set(owner, a);
    host.remove(a);

    expect(Target.get(owner)).toBeUndefined();
    expect(Target.get_name(owner)).toBe("");
    expect(Target.peek(owner)).toBe(1);
  });

  it("setting the same target twice stores the same id", () => {
    const { host, scene, Target, owner } = setup();
    const a = host.create(scene, "A");
    Target.set(owner, a);
    const first = Target.peek(owner);
    Target.set(owner, a);
    expect(Target.peek(owner)).toBe(first);
  });

  it("gives a duplicated target its own id before storing it", () => {
    const { host, scene, refs, Target, owner } = setup();
    const a = host.create(scene, "A");
    const b = host.create(scene, "B");
    refs.ensure_id(a);
    refs.ensure_id(b);
    const c = host.duplicate(scene, b, "C");

    Target.set(owner, c);
    expect(Target.peek(owner)).toBe(3);
    Target.set(owner, c);
    expect(Target.peek(owner)).toBe(3);
    expect(Target.get(owner)).toBe(c);
    expect(refs.peek_id(b)).toBe(2);
  });

  it("references entities in other namespaces", () => {
    const { host, Target, owner } = setup();
    const other = host.add_scene("Other");
    const far = host.create(other, "Far");
    Target.set(owner, far);
    expect(Target.get(owner)).toBe(far);
  });

  //=========================================================
  // Clearing
  //=========================================================

  it("set(owner, undefined) clears the field", () => {
    const { host, scene, Target, owner } = setup();
    Target.set(owner, host.create(scene, "A"));
    Target.set(owner, undefined);
    expect(host.read_field(owner, "target_id")).toBe(0);
    expect(Target.get(owner)).toBeUndefined();
  });

  it("clear stores 0", () => {
    const { host, scene, Target, owner } = setup();
    Target.set(owner, host.create(scene, "A"));
    Target.clear(owner);
    expect(Target.peek(owner)).toBeUndefined();
  });

  //=========================================================
  // Validation
  //=========================================================

  it("rejects targets the validator refuses and leaves the field alone", () => {
    const { host, scene, refs, Target, owner } = setup();
    const a = host.create(scene, "A");
    const lamp = host.create(scene, "Lamp", { type: "light" });
    Target.set(owner, a);

    expect(() => Target.set(owner, lamp)).toThrow(ValidationError);
    expect(Target.peek(owner)).toBe(1);
    expect(Target.get(owner)).toBe(a);
    expect(refs.peek_id(lamp)).toBeUndefined();
  });

  it("carries the field and target in the validation error", () => {
    const { host, scene, Target, owner } = setup();
    const lamp = host.create(scene, "Lamp", { type: "light" });
    try {
      Target.set(owner, lamp);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.category).toBe(IDREF_ERROR.REFERENCE_VALIDATION_FAILED);
      expect(err.message).toBe('"Lamp" is not a valid target for Target');
      expect(err.context).toEqual({ key: "target", target: "Lamp" });
    }
  });

  it("accepts anything without a validator", () => {
    const host = new MemoryHost();
    const scene = host.add_scene("Scene");
    const refs = new IDRef(host, { logger: silent_logger });
    const Any = refs.define_reference({ key: "any" });
    const owner = host.create(scene, "Owner");
    const lamp = host.create(scene, "Lamp", { type: "light" });

    Any.set(owner, lamp);
    expect(Any.get(owner)).toBe(lamp);
    expect(Any.is_valid_target(lamp)).toBe(true);
    expect(Any.display_name).toBe("any");
  });

  it("is_valid_target reports the validator result", () => {
    const { host, scene, Target } = setup();
    expect(Target.is_valid_target(host.create(scene, "A"))).toBe(true);
    expect(
      Target.is_valid_target(host.create(scene, "L", { type: "light" })),
    ).toBe(false);
  });

  //=========================================================
  // Names
  //=========================================================

  it("shows the target's current name after a rename", () => {
    const { host, scene, Target, owner } = setup();
    const a = host.create(scene, "A");
    Target.set(owner, a);

    a.name = "Foo";

    expect(Target.get(owner)).toBe(a);
    expect(Target.get_name(owner)).toBe("Foo");
  });

  it("set_name points the field at the named entity", () => {
    const { host, scene, Target, owner } = setup();
    const a = host.create(scene, "A");
    Target.set_name(owner, "A");
    expect(Target.get(owner)).toBe(a);
  });

  it('set_name("") clears the field', () => {
    const { host, scene, Target, owner } = setup();
    Target.set_name(owner, host.create(scene, "A").name);
    Target.set_name(owner, "");
    expect(Target.get(owner)).toBeUndefined();
  });

  it("set_name with an unknown name throws and leaves the field alone", () => {
    const { host, scene, Target, owner } = setup();
    const a = host.create(scene, "A");
    Target.set(owner, a);

    expect(() => Target.set_name(owner, "Nope")).toThrow(IDRefError);
    expect(() => Target.set_name(owner, "Nope")).toThrow('No entity named "Nope"');
    expect(Target.get(owner)).toBe(a);
  });

  it("set_name runs the validator", () => {
    const { host, scene, Target, owner } = setup();
    host.create(scene, "Lamp", { type: "light" });
    expect(() => Target.set_name(owner, "Lamp")).toThrow(ValidationError);
    expect(Target.peek(owner)).toBeUndefined();
  });

  //=========================================================
  // Picker
  //=========================================================

  it("lists valid targets by name", () => {
    const { host, scene, Target, owner } = setup();
    host.create(scene, "Alpha");
    host.create(scene, "Lamp", { type: "light" });
    host.create(scene, "Beta");

    expect(Target.picker(owner)).toEqual({
      label: "Target",
      value: "",
      candidates: ["Alpha", "Beta"],
    });
  });

  it("filters candidates by a case-insensitive search", () => {
    const { host, scene, Target, owner } = setup();
    const alpha = host.create(scene, "Alpha");
    host.create(scene, "Beta");
    host.create(scene, "Alphabet");
    Target.set(owner, alpha);

    expect(Target.picker(owner, "ALPHA")).toEqual({
      label: "Target",
      value: "Alpha",
      candidates: ["Alpha", "Alphabet"],
    });
  });

  //=========================================================
  // Definition
  //=========================================================

  it("refuses a second reference with the same key", () => {
    const { refs } = setup();
    expect(() => refs.define_reference({ key: "target" })).toThrow(IDRefError);
  });

  it("looks defined references up by key", () => {
    const { refs, Target } = setup();
    expect(refs.get_reference("target")).toBe(Target);
    expect(refs.get_reference("missing")).toBeUndefined();
  });
});
