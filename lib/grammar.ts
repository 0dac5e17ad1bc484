import { Maybe, Some, None } from '@ts-std/monads'

import { InvalidGrammar, InvalidRuleName } from './error'

export const EPSILON = 'ε'

export type Sym = string
export namespace Sym {
	const variable_name = /^[A-Z]\d*$/

	export function is_variable_name(sym: Sym) {
		return variable_name.test(sym)
	}
}

export type Production = Sym[]
export namespace Production {
	export function equals(left: readonly Sym[], right: readonly Sym[]) {
		return left.length === right.length
			&& left.every((sym, index) => sym === right[index])
	}

	export function index_in(productions: readonly Production[], production: readonly Sym[]) {
		return productions.findIndex(existing => equals(existing, production))
	}

	export function is_epsilon(production: readonly Sym[]) {
		return production.length === 1 && production[0] === EPSILON
	}

	// empty productions and stray ε markers collapse into [ε]
	export function normalize(production: readonly Sym[]): Production {
		const symbols = production.filter(sym => sym !== EPSILON)
		return symbols.length === 0 ? [EPSILON] : symbols
	}

	export function key(production: readonly Sym[]) {
		return JSON.stringify(production)
	}
}

export type RuleDeclaration = { [variable: string]: Sym[][] }

export type GrammarDeclaration = {
	variables: Sym[],
	terminals: Sym[],
	rules: RuleDeclaration,
	start_variable: Sym,
}

export class Grammar {
	readonly variables: Set<Sym>
	readonly terminals: Set<Sym>
	rules = new Map<Sym, Production[]>()
	start_variable: Sym

	constructor(variables: Sym[], terminals: Sym[], rules: RuleDeclaration, start_variable: Sym) {
		for (const variable of [...variables, ...Object.keys(rules)])
			if (!Sym.is_variable_name(variable))
				throw new InvalidRuleName(variable)

		const overlapping = terminals.filter(terminal => variables.includes(terminal))
		if (overlapping.length > 0)
			throw new InvalidGrammar([`these symbols were declared as both variables and terminals: ${overlapping.join(', ')}`])

		if (!(start_variable in rules))
			throw new InvalidGrammar([`the start variable ${start_variable} has no rule`])

		this.variables = new Set(variables)
		this.terminals = new Set(terminals)
		this.start_variable = start_variable

		for (const [lhs, productions] of Object.entries(rules))
			this.add_rule(lhs, productions)

		this.sort_with_start_first()
	}

	static from_declaration({ variables, terminals, rules, start_variable }: GrammarDeclaration) {
		return new Grammar(variables, terminals, rules, start_variable)
	}

	is_variable(sym: Sym) {
		return this.variables.has(sym)
	}

	is_terminal(sym: Sym) {
		return sym !== EPSILON && this.terminals.has(sym)
	}

	productions_of(variable: Sym): readonly Production[] {
		return this.rules.get(variable) || []
	}

	add_production(variable: Sym, production: Production) {
		this.variables.add(variable)

		const productions = this.rules.get(variable)
		if (productions === undefined) {
			this.rules.set(variable, [production])
			return
		}

		if (Production.index_in(productions, production) === -1)
			productions.push(production)
	}

	add_rule(lhs: Sym, rhs: readonly (readonly Sym[])[]) {
		if (!Sym.is_variable_name(lhs))
			throw new InvalidRuleName(lhs)

		for (const raw of rhs) {
			const production = Production.normalize(raw)
			for (const sym of production) {
				if (this.variables.has(sym) || this.terminals.has(sym))
					continue

				if (Sym.is_variable_name(sym))
					this.variables.add(sym)
				else
					this.terminals.add(sym)
			}

			this.add_production(lhs, production)
		}
	}

	remove_production(variable: Sym, production: readonly Sym[]) {
		const productions = this.rules.get(variable)
		if (productions === undefined)
			return false

		const index = Production.index_in(productions, production)
		if (index === -1)
			return false

		productions.splice(index, 1)
		return true
	}

	replace_productions(variable: Sym, productions: readonly Production[]) {
		this.rules.set(variable, [])
		for (const production of productions)
			this.add_production(variable, production)
	}

	// the rule a fresh variable would duplicate: some non-start variable whose only production is exactly this one
	find_sole_owner(production: readonly Sym[]): Maybe<Sym> {
		for (const [variable, productions] of this.rules)
			if (
				variable !== this.start_variable
				&& productions.length === 1
				&& Production.equals(productions[0], production)
			)
				return Some(variable)

		return None
	}

	sort_with_start_first() {
		const start_productions = this.rules.get(this.start_variable) || []
		const sorted = new Map<Sym, Production[]>([[this.start_variable, start_productions]])
		for (const [variable, productions] of this.rules)
			if (variable !== this.start_variable)
				sorted.set(variable, productions)

		this.rules = sorted
	}

	clone() {
		const copy = new Grammar([], [], { [this.start_variable]: [] }, this.start_variable)
		for (const variable of this.variables)
			copy.variables.add(variable)
		for (const terminal of this.terminals)
			copy.terminals.add(terminal)

		copy.rules = new Map([...this.rules].map(([variable, productions]) => [variable, productions.map(p => p.slice())]))
		return copy
	}
}
