import chalk = require('chalk')

import { LogError, NonEmpty } from './utils'

const err = chalk.red.bold
const bold = chalk.white.bold
const info = chalk.blue.bold

export class InvalidRuleName extends LogError {
	constructor(readonly rule_name: string) {
		super([`invalid rule name ${JSON.stringify(rule_name)}: expected an uppercase letter optionally followed by digits`])
	}
}

export class InvalidGrammar extends LogError {}

export class CnfViolation extends LogError {
	constructor(readonly violations: NonEmpty<string>) {
		super(['normalization produced a grammar that is not in Chomsky Normal Form:', ...violations.map(v => `  ${v}`)])
	}
}

export function format_error(title: string, error: unknown) {
	const message = error instanceof Error ? error.message : String(error)
	const [headline, ...details] = message.split('\n')
	const margin = info('\n  |  ')

	return err('error') + bold(`: ${title}`)
		+ margin + headline
		+ details.map(line => margin + line).join('')
}
