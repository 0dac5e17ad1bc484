import { Dict } from '@ts-std/types'

import { Grammar, Production, Sym } from '../grammar'

export function is_unit(grammar: Grammar, production: readonly Sym[]) {
	return production.length === 1 && grammar.is_variable(production[0])
}

export type UnitPair = [Sym, Sym]

export function unit_pairs(grammar: Grammar): UnitPair[] {
	const pairs = [] as UnitPair[]
	for (const [variable, productions] of grammar.rules)
		for (const production of productions)
			if (is_unit(grammar, production))
				pairs.push([variable, production[0]])

	return pairs
}

/**
 * Replaces every `A → B` with the non-unit productions of each variable `A` reaches
 * through a chain of unit productions. The unit graph and the non-unit productions are
 * snapshotted before anything is rewritten, so cycles such as `A → B`, `B → C`, `C → A`
 * are walked once and never feed their own output back in.
 */
export function remove_units(grammar: Grammar) {
	const pairs = unit_pairs(grammar)
	if (pairs.length === 0)
		return

	const unit_targets = {} as Dict<Sym[]>
	for (const [variable, target] of pairs)
		if (variable !== target)
			(unit_targets[variable] = unit_targets[variable] || []).push(target)

	const non_unit = {} as Dict<Production[]>
	for (const [variable, productions] of grammar.rules)
		non_unit[variable] = productions.filter(production => !is_unit(grammar, production))

	// variables whose only unit productions are self loops
	for (const [variable, target] of pairs)
		if (variable === target && !(variable in unit_targets))
			grammar.replace_productions(variable, non_unit[variable])

	for (const variable of Object.keys(unit_targets)) {
		const inlined = [...non_unit[variable]]
		for (const reached of reachable_through_units(variable, unit_targets))
			inlined.push(...(non_unit[reached] || []))

		grammar.replace_productions(variable, inlined)
	}
}

function reachable_through_units(variable: Sym, unit_targets: Dict<Sym[]>): Sym[] {
	const seen = new Set<Sym>([variable])
	const reached = [] as Sym[]
	const queue = [...unit_targets[variable]]

	let next: Sym | undefined
	while (next = queue.shift()) {
		if (seen.has(next))
			continue
		seen.add(next)
		reached.push(next)
		queue.push(...(unit_targets[next] || []))
	}

	return reached
}
