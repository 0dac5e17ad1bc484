import { tuple as t } from '@ts-std/types'

import { Grammar, Production, Sym } from '../grammar'
import { VariableMinter } from '../fresh'

// sequences this run has already bound to a variable, keyed by Production.key
export type BindingMemo = Map<string, Sym>

export class Binarizer {
	protected readonly memo: BindingMemo = new Map()

	constructor(
		readonly grammar: Grammar,
		readonly minter: VariableMinter,
		readonly prefix = 'U',
	) {}

	run() {
		this.shorten_long_productions()
		this.isolate_terminals()
	}

	// turns every production of length three or more into a chain of two-symbol productions
	shorten_long_productions() {
		const queue = [...this.grammar.rules.keys()]

		let variable: Sym | undefined
		while (variable = queue.shift()) {
			const productions = this.grammar.productions_of(variable).slice()
			const rewritten = [] as Production[]
			for (const production of productions) {
				if (production.length < 3) {
					rewritten.push(production)
					continue
				}

				const [head, ...tail] = production
				const [owner, minted] = this.bind(tail)
				if (minted)
					queue.push(owner)
				rewritten.push([head, owner])
			}

			this.grammar.replace_productions(variable, rewritten)
		}
	}

	// swaps terminals inside two-symbol productions for variables that derive only that terminal
	isolate_terminals() {
		const queue = [...this.grammar.rules.keys()]

		let variable: Sym | undefined
		while (variable = queue.shift()) {
			const productions = this.grammar.productions_of(variable).slice()
			const rewritten = productions.map(production => {
				if (production.length !== 2)
					return production

				return production.map(sym => {
					if (!this.grammar.is_terminal(sym))
						return sym

					const [owner, minted] = this.bind([sym])
					if (minted)
						queue.push(owner)
					return owner
				})
			})

			this.grammar.replace_productions(variable, rewritten)
		}
	}

	protected bind(sequence: Production): [Sym, boolean] {
		const key = Production.key(sequence)
		const remembered = this.memo.get(key)
		if (remembered !== undefined)
			return t(remembered, false)

		return this.grammar.find_sole_owner(sequence).match({
			some: owner => {
				this.memo.set(key, owner)
				return t(owner, false)
			},
			none: () => {
				const owner = this.minter.mint(this.prefix)
				this.grammar.add_rule(owner, [sequence])
				this.memo.set(key, owner)
				return t(owner, true)
			},
		})
	}
}

export function binarize(grammar: Grammar, minter: VariableMinter, prefix?: string) {
	new Binarizer(grammar, minter, prefix).run()
}
