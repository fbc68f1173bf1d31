/**
 * The capability compiled Sprout code drives.
 *
 * Compiled code only ever calls the members below, so any object with this
 * shape can be passed in as the spawner: an ECS command buffer, a scene
 * graph, a DOM builder.
 */

/** Called when an event is triggered on an observed entity. */
export type Observer<H, E = unknown> = (this: H, event: E, target: H) => void;

export interface EntityCommands<H> {
  /** Handle of the entity these commands act on */
  id(): H;
  insert(...components: unknown[]): this;
  setParent(parent: H | EntityCommands<H>): this;
  /** Spawn a new entity as a child of this one */
  addChild(...components: unknown[]): EntityCommands<H>;
  observe(callback: Observer<H>): this;
  /** A second builder for the same entity, handed to code blocks */
  reborrow(): EntityCommands<H>;
}

export interface Spawner<H> {
  spawn(...components: unknown[]): EntityCommands<H>;
  /** Commands for an entity that already exists */
  entity(handle: H): EntityCommands<H>;
}
