/**
 * HCL Language Server
 *
 * Main entry point - exports the analysis pieces; the server itself is
 * started via server.ts (stdio).
 */

export * from "./types";

export {
  DocumentManager,
  type DocumentManagerOptions,
} from "./document-manager";

export {
  SEMANTIC_TOKENS_LEGEND,
  TOKEN_TYPES,
  TOKEN_MODIFIERS,
  TokenTypeIndex,
  TokenModifierFlags,
  classifyTokens,
  encodeTokens,
  provideSemanticTokens,
  type SemanticToken,
} from "./semantic-tokens";

export { documentRange, toLspPosition, toLspRange } from "./positions";
