export { ParseError, allMethods, isMethod } from "./routes";
export type {
  Method,
  NestedRoute,
  NormalRoute,
  OpaqueCode,
  PathTemplate,
  Position,
  RouteEntry,
  RouteTable,
} from "./routes";
export { Lexer, describeToken } from "./routes.lexer";
export type { Token } from "./routes.lexer";
export { parseRoutes } from "./routes.parser";
export type { SourceRange } from "./routes.parser";
export { deriveHandler, renderPathTemplate } from "./routes.handler";
export { generateRoutes, renderEndpoint } from "./routes.codegen";
export { compileRoutes, expandMacros, listRoutes } from "./routes.compiler";
export type { Expansion } from "./routes.compiler";
export {
  configCodec,
  decodeConfig,
  defaultOptions,
  parseConfigFile,
  resolveOptions,
} from "./routes.config";
export type { CompilerOptions, ConfigFile, Layout } from "./routes.config";
