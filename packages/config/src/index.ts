export { FileSource, type FileSourceOptions } from "./adapters/file/file-source"
export { parseKdlDocument } from "./adapters/kdl/kdl-document"
export {
  formatConnectors,
  formatFilterChain,
  formatKeyProfile,
  formatListeners,
  formatRootConfig,
  formatService,
} from "./adapters/kdl/kdl-writer"
export { TextSource } from "./adapters/text/text-source"
export { collectDocuments, type DocumentReader } from "./core/collect-documents"
export {
  ConfigDiagnostic,
  type ConfigDiagnosticOptions,
  type DiagnosticKind,
} from "./core/diagnostics/config-diagnostic"
export { DocumentSourceError } from "./core/diagnostics/document-source-error"
export { renderSnippet } from "./core/diagnostics/render-snippet"
export { type LoadProxyConfigOptions, loadProxyConfig, mergeRootConfigs } from "./core/load"
export { BlockParser } from "./core/parser/block-parser"
export { type ArgRange, type Focus, ParseContext } from "./core/parser/parse-context"
export { type KeyType, type NamePredicate, namePredicate, type Rule, Rules } from "./core/parser/rules"
export {
  formatParseFailure,
  keywordType,
  parsed,
  rejected,
  type ScalarParseResult,
  type ScalarType,
} from "./core/parser/scalar-type"
export { TypedValue } from "./core/parser/typed-value"
export { Fqdn } from "./core/scalars/fqdn"
export { SocketAddress } from "./core/scalars/socket-address"
export { ChainSection } from "./core/sections/chain-section"
export { ConnectorsSection } from "./core/sections/connectors-section"
export { DefinitionsSection, type DefinitionsSectionDeps } from "./core/sections/definitions-section"
export { KeyProfileSection } from "./core/sections/key-profile-section"
export { ListenersSection } from "./core/sections/listeners-section"
export { includeDirectives, RootSection, type RootSectionDeps } from "./core/sections/root-section"
export { ServiceSection } from "./core/sections/service-section"
export * from "./ports/connectors"
export * from "./ports/definitions"
export type * from "./ports/document"
export type * from "./ports/document-source"
export type * from "./ports/listeners"
export type * from "./ports/proxy-config"
export type * from "./ports/section-parser"
