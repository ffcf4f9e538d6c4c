export {
  collectTags,
  evaluateTagExpression,
  formatTagExpression,
  parseTagExpression,
  tryParseTagExpression,
  type TagExpression,
} from './tag_expression.js';
export {
  definitionKey,
  detectDefinitionKind,
  formatReferenceDefinition,
  getDefinitionTemplates,
  parseReferenceDefinition,
  type ReferenceDefinition,
  type ReferenceDefinitionKind,
  type ReferenceRegistry,
  type TagExpressionScope,
} from './reference_definition.js';
export {
  ResolutionScope,
  resolveNamedReference,
  resolveReference,
  type ReferenceResolution,
  type ResolverContext,
} from './resolver.js';
