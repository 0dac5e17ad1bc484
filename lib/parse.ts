import { Result, Ok, Err } from '@ts-std/monads'

import { EPSILON, GrammarDeclaration, RuleDeclaration, Sym } from './grammar'

const arrow = /->|→/

// a variable name with its digits, or any other single character
export function tokenize_production(source: string): Sym[] {
	return source.replace(/\s+/g, '').match(/[A-Z]\d*|./gu) || []
}

/**
 * Reads rules written one per line, such as
 *
 * ```
 * S -> aSb | ε
 * A → B | a
 * ```
 *
 * Blank lines and lines starting with `#` are ignored. The first rule's variable is the
 * start variable unless `start_variable` is given.
 */
export function parse_grammar(source: string, start_variable?: Sym): Result<GrammarDeclaration> {
	const rules = {} as RuleDeclaration
	const variables = [] as Sym[]

	const lines = source.split('\n')
	for (const [index, raw_line] of lines.entries()) {
		const line = raw_line.trim()
		if (line === '' || line.startsWith('#'))
			continue

		const parts = line.split(arrow)
		if (parts.length !== 2)
			return Err(`line ${index + 1}: expected exactly one arrow in ${JSON.stringify(line)}`)

		const lhs = parts[0].trim()
		if (lhs === '')
			return Err(`line ${index + 1}: missing the variable before the arrow`)

		const productions = parts[1].split('|').map(alternative => {
			const symbols = tokenize_production(alternative)
			return symbols.length === 0 ? [EPSILON] : symbols
		})

		if (!variables.includes(lhs)) {
			rules[lhs] = []
			variables.push(lhs)
		}
		rules[lhs].push(...productions)
	}

	const start = start_variable !== undefined ? start_variable : variables[0]
	if (start === undefined)
		return Err('the grammar has no rules')

	return Ok({ variables, terminals: [], rules, start_variable: start })
}
