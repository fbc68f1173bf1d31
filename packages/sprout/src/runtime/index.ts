export type { EntityCommands, Observer, Spawner } from "./spawner.js";
export { World } from "./world.js";
export type { EntityId, EntityRecord, WorldOperation } from "./world.js";
export { run } from "./run.js";
