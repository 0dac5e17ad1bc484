import { EPSILON, Grammar, Production } from './grammar'

export function render_production(production: readonly string[]) {
	return Production.is_epsilon(production) || production.length === 0
		? EPSILON
		: production.join('')
}

export function render_rule(variable: string, productions: readonly Production[]) {
	return `${variable} → ${productions.map(render_production).join('|')}`
}

// one line per variable, the start variable's line first
export function render_grammar(grammar: Grammar) {
	const lines = [render_rule(grammar.start_variable, grammar.productions_of(grammar.start_variable))]
	for (const [variable, productions] of grammar.rules)
		if (variable !== grammar.start_variable)
			lines.push(render_rule(variable, productions))

	return lines.join('\n')
}
