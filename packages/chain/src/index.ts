/**
 * @catalog/chain: in-process execution host.
 *
 * The Catalog talks to its environment through the ExecutionHost interface
 * from @catalog/ledger. MemoryHost implements it for the node and for tests;
 * MemoryContentManager is the matching content-manager collaborator.
 */

export type {
  Transfer,
  ReceiveHook,
  MemoryHostOptions,
  MemoryContentManagerOptions,
  Grant,
} from "./types.js";

export { MemoryHost } from "./memory-host.js";
export { MemoryContentManager } from "./content-manager.js";
