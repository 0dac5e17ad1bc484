import { Dict } from '@ts-std/types'

import { Grammar, Sym } from './grammar'
import { InvalidRuleName } from './error'

export class VariableMinter {
	protected counters: Dict<number> = {}
	protected minted = new Set<Sym>()

	constructor(readonly grammar: Grammar) {}

	static check_prefix(prefix: string) {
		if (!/^[A-Z]$/.test(prefix))
			throw new InvalidRuleName(prefix)
	}

	mint(prefix: string, from = 1): Sym {
		VariableMinter.check_prefix(prefix)

		const counter = this.counters[prefix]
		let index = counter !== undefined ? counter : from
		let name = `${prefix}${index}`
		while (this.is_taken(name)) {
			index++
			name = `${prefix}${index}`
		}

		this.counters[prefix] = index + 1
		this.minted.add(name)
		return name
	}

	protected is_taken(name: Sym) {
		return this.minted.has(name)
			|| this.grammar.variables.has(name)
			|| this.grammar.terminals.has(name)
	}
}
