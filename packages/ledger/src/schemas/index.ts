/**
 * Schema barrel export.
 */

export { CatalogConfig, type ConfigKey } from "./config.js";

export {
  CallV1,
  CallOp,
  NoArgs,
  RefArgs,
  AmountArgs,
  SecondsArgs,
  ViewsArgs,
  DeployContentArgs,
} from "./call.js";
