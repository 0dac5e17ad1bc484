import { Grammar } from '../grammar'
import { VariableMinter } from '../fresh'
import { CnfViolation } from '../error'
import { check_cnf } from '../validate'
import { render_grammar } from '../render'
import { make_console } from '../utils'

import { isolate_start } from './isolate_start'
import { remove_epsilon } from './remove_epsilon'
import { remove_units } from './remove_units'
import { binarize } from './binarize'
import { prune_useless } from './prune'

export { isolate_start, appears_on_right } from './isolate_start'
export { remove_epsilon, nullable_variables } from './remove_epsilon'
export { remove_units, unit_pairs, is_unit } from './remove_units'
export { binarize, Binarizer } from './binarize'
export { prune_useless, generating_variables, reachable_variables } from './prune'

export type NormalizeOptions = Readonly<{
	// letter the binarization stage names its fresh variables with
	fresh_prefix?: string,
	prune?: boolean,
	trace?: boolean,
}>

export type Stage = 'isolate_start' | 'remove_epsilon' | 'remove_units' | 'binarize' | 'prune'

/**
 * Rewrites `grammar` in place into Chomsky Normal Form and returns it.
 * The stages run in a fixed order since each relies on the shape the previous one leaves:
 * no start on a right-hand side, then no ε outside the start, then no unit productions.
 */
export function normalize(grammar: Grammar, options: NormalizeOptions = {}): Grammar {
	const { fresh_prefix = 'U', prune = false, trace = false } = options
	VariableMinter.check_prefix(fresh_prefix)
	const minter = new VariableMinter(grammar)
	const console = trace ? make_console() : undefined

	function after(stage: Stage) {
		if (console === undefined)
			return
		console.log(`after ${stage}:`)
		console.log(render_grammar(grammar))
		console.log()
	}

	isolate_start(grammar, minter)
	after('isolate_start')
	remove_epsilon(grammar)
	after('remove_epsilon')
	remove_units(grammar)
	after('remove_units')
	binarize(grammar, minter, fresh_prefix)
	after('binarize')

	if (prune) {
		prune_useless(grammar)
		after('prune')
	}

	const [first_violation, ...violations] = check_cnf(grammar)
	if (first_violation !== undefined)
		throw new CnfViolation([first_violation, ...violations])

	return grammar
}
