/**
 * In-memory spawner.
 *
 * Entities are numbered from 0. Every operation is appended to `log`, which
 * makes the order of a compiled program's calls directly observable.
 */
import type { EntityCommands, Observer, Spawner } from "./spawner.js";

export type EntityId = number;

export type WorldOperation =
  | { op: "spawn"; entity: EntityId; components: unknown[] }
  | { op: "insert"; entity: EntityId; components: unknown[] }
  | { op: "setParent"; entity: EntityId; parent: EntityId }
  | { op: "addChild"; parent: EntityId; entity: EntityId; components: unknown[] }
  | { op: "observe"; entity: EntityId };

export type EntityRecord = {
  id: EntityId;
  components: unknown[];
  parent?: EntityId;
  children: EntityId[];
  observers: Observer<EntityId>[];
};

export class World implements Spawner<EntityId> {
  readonly log: WorldOperation[] = [];
  private readonly records = new Map<EntityId, EntityRecord>();
  private nextId = 0;

  spawn(...components: unknown[]): EntityCommands<EntityId> {
    const id = this.create(components);
    this.log.push({ op: "spawn", entity: id, components });
    return new WorldCommands(this, id);
  }

  entity(handle: EntityId): EntityCommands<EntityId> {
    this.record(handle);
    return new WorldCommands(this, handle);
  }

  get size(): number {
    return this.records.size;
  }

  get(handle: EntityId): Readonly<EntityRecord> | undefined {
    return this.records.get(handle);
  }

  componentsOf(handle: EntityId): readonly unknown[] {
    return this.record(handle).components;
  }

  parentOf(handle: EntityId): EntityId | undefined {
    return this.record(handle).parent;
  }

  childrenOf(handle: EntityId): readonly EntityId[] {
    return this.record(handle).children;
  }

  /** Entities without a parent, in creation order. */
  roots(): EntityId[] {
    return [...this.records.values()].filter((r) => r.parent === undefined).map((r) => r.id);
  }

  /**
   * Deliver `event` to every observer of `handle`, in registration order.
   * Returns how many observers ran.
   */
  trigger(handle: EntityId, event: unknown): number {
    const observers = [...this.record(handle).observers];
    for (const observer of observers) observer.call(handle, event, handle);
    return observers.length;
  }

  // ── Operations used by WorldCommands ─────────────────────────────────────

  insert(handle: EntityId, components: unknown[]): void {
    this.record(handle).components.push(...components);
    this.log.push({ op: "insert", entity: handle, components });
  }

  setParent(handle: EntityId, parent: EntityId): void {
    if (handle === parent) throw new Error(`Entity ${handle} cannot be its own parent`);
    const record = this.record(handle);
    const next = this.record(parent);
    if (record.parent !== undefined) {
      const previous = this.record(record.parent);
      previous.children = previous.children.filter((c) => c !== handle);
    }
    record.parent = parent;
    next.children.push(handle);
    this.log.push({ op: "setParent", entity: handle, parent });
  }

  addChild(parent: EntityId, components: unknown[]): EntityId {
    const record = this.record(parent);
    const id = this.create(components);
    this.record(id).parent = parent;
    record.children.push(id);
    this.log.push({ op: "addChild", parent, entity: id, components });
    return id;
  }

  observe(handle: EntityId, callback: Observer<EntityId>): void {
    this.record(handle).observers.push(callback);
    this.log.push({ op: "observe", entity: handle });
  }

  private create(components: unknown[]): EntityId {
    const id = this.nextId++;
    this.records.set(id, { id, components: [...components], children: [], observers: [] });
    return id;
  }

  private record(handle: EntityId): EntityRecord {
    const record = this.records.get(handle);
    if (!record) throw new Error(`Entity ${handle} does not exist`);
    return record;
  }
}

class WorldCommands implements EntityCommands<EntityId> {
  constructor(
    private readonly world: World,
    private readonly handle: EntityId,
  ) {}

  id(): EntityId {
    return this.handle;
  }

  insert(...components: unknown[]): this {
    this.world.insert(this.handle, components);
    return this;
  }

  setParent(parent: EntityId | EntityCommands<EntityId>): this {
    this.world.setParent(this.handle, typeof parent === "number" ? parent : parent.id());
    return this;
  }

  addChild(...components: unknown[]): EntityCommands<EntityId> {
    return new WorldCommands(this.world, this.world.addChild(this.handle, components));
  }

  observe(callback: Observer<EntityId>): this {
    this.world.observe(this.handle, callback);
    return this;
  }

  reborrow(): EntityCommands<EntityId> {
    return new WorldCommands(this.world, this.handle);
  }
}
