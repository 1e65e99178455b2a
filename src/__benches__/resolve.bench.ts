import { bench, describe } from "vitest";
import { IDRef } from "../idref";
import { MemoryHost, type MemoryEntity } from "../__tests__/memory_host";
import { silent_logger } from "../utils/logger";

const TIERS = [1_000, 10_000, 100_000] as const;

function populated(n: number) {
  const host = new MemoryHost();
  const scene = host.add_scene("Scene");
  const refs = new IDRef(host, { logger: silent_logger });
  const entities: MemoryEntity[] = [];
  for (let i = 0; i < n; i++) {
    entities.push(host.create(scene, `E${i}`, { id: i + 1 }));
  }
  return { host, scene, refs, entities };
}

// ============================================================
// resolve — full scan per call, no index
// ============================================================

describe("resolve", () => {
  for (const N of TIERS) {
    const { refs } = populated(N);
    bench(`resolve last of ${N.toLocaleString()} entities`, () => {
      refs.resolve(N);
    });
  }
});

// ============================================================
// ensure_id — already assigned (collision check only)
// ============================================================

describe("ensure_id (assigned)", () => {
  for (const N of TIERS) {
    const { refs, entities } = populated(N);
    bench(`ensure_id among ${N.toLocaleString()} entities`, () => {
      refs.ensure_id(entities[0]);
    });
  }
});

// ============================================================
// ReferenceField.get_name — resolve + name lookup
// ============================================================

describe("reference get_name", () => {
  for (const N of TIERS) {
    const { host, scene, refs, entities } = populated(N);
    const Target = refs.define_reference({ key: "target" });
    const owner = host.create(scene, "Owner");
    Target.set(owner, entities[N - 1]);
    bench(`get_name across ${N.toLocaleString()} entities`, () => {
      Target.get_name(owner);
    });
  }
});
