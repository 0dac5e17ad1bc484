import { Grammar, Sym } from '../grammar'

export function generating_variables(grammar: Grammar): Set<Sym> {
	const generating = new Set<Sym>()

	let changed = true
	while (changed) {
		changed = false
		for (const [variable, productions] of grammar.rules) {
			if (generating.has(variable))
				continue

			const generates = productions.some(production => production.every(sym => !grammar.is_variable(sym) || generating.has(sym)))
			if (generates) {
				generating.add(variable)
				changed = true
			}
		}
	}

	return generating
}

export function reachable_variables(grammar: Grammar): Set<Sym> {
	const reachable = new Set<Sym>([grammar.start_variable])
	const queue = [grammar.start_variable]

	let variable: Sym | undefined
	while (variable = queue.shift())
		for (const production of grammar.productions_of(variable))
			for (const sym of production)
				if (grammar.is_variable(sym) && !reachable.has(sym)) {
					reachable.add(sym)
					queue.push(sym)
				}

	return reachable
}

// drops variables that derive no terminal word, then those the start can no longer reach
export function prune_useless(grammar: Grammar) {
	const generating = generating_variables(grammar)
	for (const [variable, productions] of grammar.rules) {
		const kept = productions.filter(production => production.every(sym => !grammar.is_variable(sym) || generating.has(sym)))
		grammar.replace_productions(variable, kept)
	}

	const reachable = reachable_variables(grammar)
	const removed = [] as Sym[]
	for (const variable of [...grammar.variables])
		if (!reachable.has(variable)) {
			grammar.variables.delete(variable)
			grammar.rules.delete(variable)
			removed.push(variable)
		}

	return removed
}
