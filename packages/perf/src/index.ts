export {
	trackMicro,
	createMicroTracker,
	type MicroTrackOptions,
} from './perfTracker'

export {
	logOperationSimple,
	formatDuration,
	setLogLevel,
	type LogLevel,
} from './perfLogger'
