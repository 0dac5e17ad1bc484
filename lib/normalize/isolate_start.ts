import { Grammar } from '../grammar'
import { VariableMinter } from '../fresh'

export function appears_on_right(grammar: Grammar, variable: string) {
	for (const productions of grammar.rules.values())
		for (const production of productions)
			if (production.includes(variable))
				return true

	return false
}

// gives the grammar a start variable no right-hand side refers to
export function isolate_start(grammar: Grammar, minter: VariableMinter) {
	const old_start = grammar.start_variable
	if (!appears_on_right(grammar, old_start))
		return false

	const new_start = minter.mint(old_start[0], 0)
	grammar.add_rule(new_start, [[old_start]])
	grammar.start_variable = new_start
	grammar.sort_with_start_first()
	return true
}
