import * as util from 'util'
import { Console } from 'console'

export function make_console(depth = 5) {
	return new Console({ stdout: process.stdout, stderr: process.stderr, inspectOptions: { depth } })
}

export function log_error_message(lines: unknown[], depth = null as number | null) {
	return lines.map(line => {
		return typeof line === 'string'
			? line
			: util.inspect(line, { depth })
	}).join('\n')
}

export class LogError extends Error {
	constructor(lines: unknown[], depth = null as number | null) {
		super(log_error_message(lines, depth))
		this.name = new.target.name
	}
}

export type NonEmpty<T> = [T, ...T[]]

export function exhaustive(v: never): never {
	throw new LogError(['unexpected value:', v])
}
