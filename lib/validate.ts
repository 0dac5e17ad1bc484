import { EPSILON, Grammar, Production, Sym } from './grammar'
import { exhaustive } from './utils'
import { render_production } from './render'

export type CnfProblem =
	| { type: 'NonStartEpsilon', variable: Sym }
	| { type: 'NonTerminalSingle', variable: Sym, production: Production }
	| { type: 'TerminalInPair', variable: Sym, production: Production }
	| { type: 'StartOnRight', variable: Sym, production: Production }
	| { type: 'BadLength', variable: Sym, production: Production }

export function find_cnf_problems(grammar: Grammar): CnfProblem[] {
	const start = grammar.start_variable
	const problems = [] as CnfProblem[]

	for (const [variable, productions] of grammar.rules)
		for (const production of productions) {
			if (Production.is_epsilon(production)) {
				if (variable !== start)
					problems.push({ type: 'NonStartEpsilon', variable })
				continue
			}

			if (production.includes(start))
				problems.push({ type: 'StartOnRight', variable, production })

			switch (production.length) {
			case 1:
				if (!grammar.is_terminal(production[0]))
					problems.push({ type: 'NonTerminalSingle', variable, production })
				continue
			case 2:
				if (!production.every(sym => grammar.is_variable(sym)))
					problems.push({ type: 'TerminalInPair', variable, production })
				continue
			default:
				problems.push({ type: 'BadLength', variable, production })
			}
		}

	return problems
}

export function describe_problem(problem: CnfProblem): string {
	switch (problem.type) {
	case 'NonStartEpsilon':
		return `${problem.variable} → ${EPSILON}: only the start variable may derive ${EPSILON}`
	case 'NonTerminalSingle':
		return `${problem.variable} → ${render_production(problem.production)}: a single symbol must be a terminal`
	case 'TerminalInPair':
		return `${problem.variable} → ${render_production(problem.production)}: a pair must consist of two variables`
	case 'StartOnRight':
		return `${problem.variable} → ${render_production(problem.production)}: the start variable appears on a right-hand side`
	case 'BadLength':
		return `${problem.variable} → ${render_production(problem.production)}: productions must have one or two symbols`
	default: return exhaustive(problem)
	}
}

export function check_cnf(grammar: Grammar): string[] {
	return find_cnf_problems(grammar).map(describe_problem)
}
