export {CommandExecutor} from './executor.js'
export {ExecaCommandExecutor, commandEnv} from './execa-executor.js'
export {RecordingExecutor, type RecordedCommand} from './recording-executor.js'
export type {CommandResult, LogLine, OnLogLine, RunOptions} from './types.js'
