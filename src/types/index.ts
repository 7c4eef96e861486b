export type { CompiledExpression, CompileResult, StepExpression } from './expressions.js';
export type { CompileOptions, Logger } from './options.js';
export type { ParameterTransformer, ParameterType, ParameterTypeLookup, ParameterTypeRegistry } from './parameters.js';
