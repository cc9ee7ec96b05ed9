// Console
export { Cli, createCli } from './cli/Cli.js';
export type { CommandLineResult, CreateCliResult } from './cli/Cli.js';
export { settingsSchema, commandSchema, commandTableSchema } from './cli/config.js';
export type { CliOptions, CliMemory, CliSettings } from './cli/config.js';
export { CliStatus, CliError } from './cli/status.js';
export type { CliStatusCode } from './cli/status.js';

// Buffers
export { RingBuffer, RING_GUARD_BYTES } from './buffer/RingBuffer.js';
export { OutputBuffer } from './buffer/OutputBuffer.js';
export type { TransmitFn } from './buffer/OutputBuffer.js';

// History
export { HistoryRing, historyStorageSize } from './history/HistoryRing.js';

// Editor
export { LineEditor } from './editor/LineEditor.js';
export type { EditorResult, LineEditorOptions } from './editor/LineEditor.js';
export { EscapeDecoder, EscapeKey, EscapeState } from './editor/EscapeDecoder.js';
export type { DecodeResult } from './editor/EscapeDecoder.js';

// Dispatch
export { Dispatcher } from './dispatch/Dispatcher.js';
export { createBuiltinCommands } from './dispatch/builtins.js';
export { matchChoice, matchCommand } from './dispatch/match.js';
export { parseParams, parseInteger, parseFloatPrefix } from './dispatch/params.js';
export type { ParamIssue, ParseReport } from './dispatch/params.js';
export { LineTokenizer, FIELD_DELIMITERS } from './dispatch/tokenizer.js';
export { Args } from './dispatch/types.js';
export type { ArgValue, ArgType, Command, CommandHandler, CommandIO } from './dispatch/types.js';

// Terminal
export { TerminalWriter } from './terminal/TerminalWriter.js';
export { Control, CONTROL_SEQUENCES } from './terminal/controls.js';
export type { ControlAction } from './terminal/controls.js';
export type { CliTransport, CliLogger, MessageLevel } from './terminal/transport.js';

// Utils
export { trim, isSpace, isControl, bytesToString } from './utils/text.js';
export { green, yellow } from './utils/colors.js';
