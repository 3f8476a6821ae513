/**
 * Entity registry – maps entity-type names to their descriptors and decides
 * the order the pipeline processes them in.
 */
import {
  DuplicateEntityError,
  InvalidDescriptorError,
  UnknownEntityError,
} from "../core/exceptions.js";
import { ACCOUNT } from "./account.js";
import { findColumn, type EntityDescriptor } from "./descriptor.js";
import { TRANSACTION } from "./transaction.js";

export class EntityRegistry {
  private entries = new Map<string, EntityDescriptor>();

  constructor(descriptors: readonly EntityDescriptor[] = []) {
    for (const d of descriptors) this.register(d);
  }

  register(descriptor: EntityDescriptor): void {
    if (this.entries.has(descriptor.name)) {
      throw new DuplicateEntityError(descriptor.name);
    }
    this.entries.set(descriptor.name, descriptor);
  }

  lookup(name: string): EntityDescriptor {
    const descriptor = this.entries.get(name);
    if (!descriptor) {
      throw new UnknownEntityError(name, [...this.entries.keys()]);
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** The registered parent of `descriptor`, or null for a root entity. */
  parentOf(descriptor: EntityDescriptor): EntityDescriptor | null {
    if (descriptor.parentEntity === null) return null;
    return this.lookup(descriptor.parentEntity);
  }

  /**
   * All descriptors, parents before children. Unrelated entities keep their
   * registration order.
   */
  orderedEntities(): EntityDescriptor[] {
    const all = [...this.entries.values()];
    for (const d of all) this.checkParentLink(d);

    const ordered: EntityDescriptor[] = [];
    const placed = new Set<string>();
    while (ordered.length < all.length) {
      const next = all.find(
        (d) =>
          !placed.has(d.name) &&
          (d.parentEntity === null || placed.has(d.parentEntity)),
      );
      if (!next) {
        const stuck = all.filter((d) => !placed.has(d.name)).map((d) => d.name);
        throw new InvalidDescriptorError(stuck[0] ?? "(unknown)", [
          `parent chain forms a cycle: ${stuck.join(" -> ")}`,
        ]);
      }
      ordered.push(next);
      placed.add(next.name);
    }
    return ordered;
  }

  private checkParentLink(d: EntityDescriptor): void {
    const parent = this.parentOf(d);
    if (!parent || d.referencedKeyColumn === null) return;
    if (!findColumn(parent, d.referencedKeyColumn)) {
      throw new InvalidDescriptorError(d.name, [
        `referencedKeyColumn '${d.referencedKeyColumn}' is not a column of '${parent.name}'`,
      ]);
    }
  }
}

/** A fresh registry holding the account → transaction chain. */
export function createDefaultRegistry(): EntityRegistry {
  return new EntityRegistry([ACCOUNT, TRANSACTION]);
}
