export {
  TOOL_NAME_SEPARATOR,
  MAX_QUALIFIED_NAME_LENGTH,
  encodeToolName,
  decodeToolName,
  checkToolName,
} from './tool-name.js';
export type { DecodedToolName } from './tool-name.js';
export { buildToolCatalog } from './tool-catalog.js';
export type {
  BuildToolCatalogOptions,
  CatalogEntry,
  ToolCallOutcome,
  ToolCatalog,
} from './tool-catalog.js';
