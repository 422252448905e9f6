export { preprocess } from './source'
export type { SourceLine } from './source'
export { LineMap } from './line-map'
export { parse, Parser, ParseError } from './parser'
export type { ParsedTemplate } from './parser'
export { literal_statement, OUTPUT_FN, ACCUMULATOR } from './literal'
export { generate, Emitter } from './emitter'
export { execute, check_structure } from './execute'
export type { ExecutionResult, ExecutionFailure, SyntaxFailure, RuntimeFailure } from './execute'
export { resolve, format_diagnostic } from './diagnostics'
export type { Diagnostic } from './diagnostics'
export { StreamSink, MemorySink, FileSink } from './format'
export type { OutputSink } from './format'
export { compile, parse_and_run } from './template'
export type { CompiledTemplate, RunOptions, RunResult } from './template'
export { find_config, load_config, parse_config, ConfigError } from './config'
export type { WeftConfig } from './config'
export type { Node, Sequence, ControlSequence, ControlBlock, StatementLine } from './nodes'
export type { StartKeyword, MiddleKeyword, Keyword } from './keywords'
