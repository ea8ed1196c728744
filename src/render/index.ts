/**
 * Renderer exports
 */

export {
  renderDocument,
  planDocument,
  NO_HELP,
  TOP_ANCHOR,
  type RenderOptions,
  type DocumentUnit,
  type CallableUnit,
  type ContainerUnit,
} from './markdown.js';
export { renderUsage, usageArguments, formatCall, receiverName, CONSTRUCTOR_NAME } from './usage.js';
export { AnchorRegistry, anchorSlug } from './anchors.js';
