/**
 * termpost core library
 *
 * Markdown news posts rendered for the terminal: escape-styled text,
 * markdown, and a message of the day that expires with the post.
 */

// Errors
export {
  DateParseError,
  describeError,
  errorCategory,
  InvalidConfigurationError,
  MalformedInputError,
  NotFoundError,
  ValidationError,
  type ErrorCategory,
} from "./errors";

// Document model
export * as build from "./document/build";
export {
  FrontMatterSchema,
  parseDocument,
  readPostInfo,
  type FrontMatter,
  type ParsedDocument,
  type PostInfo,
} from "./document/parse";
export { textContent } from "./document/types";
export type {
  DirectiveNode,
  DocumentNode,
  DocumentRoot,
  ListItemNode,
  NodeKind,
  UnknownNode,
} from "./document/types";

// Rendering
export {
  applySgr,
  decodeSgr,
  encode,
  ESC,
  hasActiveStyles,
  RESET,
  STYLE_RUNS,
  styleSequence,
  type ActiveStyles,
  type StyleIntent,
  type StyleRun,
} from "./render/style";
export {
  RECOGNIZED_DIRECTIVES,
  render,
  type RenderedText,
  type RenderOptions,
} from "./render/translate";
export {
  stripEscapes,
  visibleLength,
  wrap,
  wrapText,
  type WrapOptions,
} from "./render/wrap";
export { convertDocument, selectArtifact, type ConvertOptions } from "./convert";

// MOTD
export {
  assemble,
  composeParts,
  indentLines,
  selectState,
  type AssembleOptions,
  type MotdResult,
  type MotdState,
} from "./motd/assemble";
export { formatPostDate, HOUR_MS, parsePostDate, postAgeMs } from "./motd/date";

// Feed and files
export { FeedEntrySchema, readLatestPost, type FeedEntry } from "./feed";
export {
  bottomDir,
  changeExtension,
  postUrl,
  readSource,
  readTextPart,
  resolvePath,
  sourcePathFromHtmlLink,
  validUrl,
  WEBSITE_DIR,
  writeArtifact,
  type WriteArtifactOptions,
} from "./files";

// Config
export {
  applyEnvOverrides,
  findProjectConfigPath,
  getConfigPaths,
  getNestedValue,
  loadConfig,
  parseConfigText,
  PROJECT_CONFIG_FILENAME,
  serializeConfigObject,
  setConfigValue,
  type ConfigPaths,
  type LoadConfigOptions,
} from "./config";
export { ensureConfigDirectory, PATHS } from "./paths";
export {
  DEFAULT_CONFIG,
  MotdConfigSchema,
  OutputFormatSchema,
  TermpostConfigSchema,
  type MotdConfig,
  type OutputFormat,
  type TermpostConfig,
} from "./schema/config";
