import { EPSILON, Grammar, Production, Sym } from '../grammar'
import { generate_combinations } from '../combinations'

export function nullable_variables(grammar: Grammar): Sym[] {
	const nullable = [] as Sym[]
	for (const [variable, productions] of grammar.rules)
		if (productions.some(Production.is_epsilon))
			nullable.push(variable)

	return nullable
}

/**
 * Removes every `[ε]` production except the start variable's.
 *
 * Each nullable variable is processed once: its `[ε]` is dropped and every production
 * mentioning it is replaced by all its keep/drop combinations. A variable that gains `[ε]`
 * this way joins the worklist, which is what carries nullability through chains like
 * `A → B C`, `B → ε`, `C → ε`. A variable that was already processed has had its
 * nullability compensated, so an `[ε]` it would regain is discarded.
 */
export function remove_epsilon(grammar: Grammar) {
	const visited = new Set<Sym>()
	const worklist = nullable_variables(grammar)

	let variable: Sym | undefined
	while (variable = worklist.shift()) {
		if (visited.has(variable))
			continue

		if (variable !== grammar.start_variable)
			grammar.remove_production(variable, [EPSILON])
		visited.add(variable)

		for (const owner of expand_occurrences(grammar, variable, visited))
			if (!visited.has(owner) && grammar.productions_of(owner).some(Production.is_epsilon))
				worklist.push(owner)
	}
}

function expand_occurrences(grammar: Grammar, variable: Sym, visited: Set<Sym>) {
	const touched = [] as Sym[]

	for (const [owner, productions] of grammar.rules) {
		if (!productions.some(production => production.includes(variable)))
			continue

		const keeps_epsilon = !visited.has(owner) || owner === grammar.start_variable
		const expanded = [] as Production[]
		for (const production of productions) {
			if (!production.includes(variable)) {
				expanded.push(production)
				continue
			}

			for (const combination of generate_combinations(production, variable))
				if (keeps_epsilon || !Production.is_epsilon(combination))
					expanded.push(combination)
		}

		grammar.replace_productions(owner, expanded)
		touched.push(owner)
	}

	return touched
}
