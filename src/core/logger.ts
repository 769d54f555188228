import { type Logger, destination, pino } from 'pino'

export type { Logger }

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

function resolveLevel(raw: string | undefined): string {
	const level = raw?.toLowerCase()
	return LEVELS.find((l) => l === level) ?? 'warn'
}

// stderr keeps stdout free for command output
export const logger: Logger = pino(
	{ name: 'bdg', level: resolveLevel(process.env.BDG_LOG_LEVEL) },
	destination(2),
)

export const silentLogger: Logger = pino({ level: 'silent' })
