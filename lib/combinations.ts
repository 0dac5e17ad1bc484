import { Production, Sym } from './grammar'

/**
 * Every way of keeping or dropping each occurrence of `variable` in `production`.
 * The all-kept choice comes first and the all-dropped choice last.
 * A choice that drops every symbol comes out as `[ε]`.
 */
export function generate_combinations(production: readonly Sym[], variable: Sym): Production[] {
	return dedupe(suffix_combinations(production, 0, variable).map(Production.normalize))
}

// choices for later occurrences vary slowest, so the all-kept choice stays first
function suffix_combinations(production: readonly Sym[], index: number, variable: Sym): Sym[][] {
	if (index === production.length)
		return [[]]

	const sym = production[index]
	const rests = suffix_combinations(production, index + 1, variable)
	const results = [] as Sym[][]
	for (const rest of rests) {
		results.push([sym, ...rest])
		if (sym === variable)
			results.push(rest)
	}

	return dedupe(results)
}

function dedupe<P extends readonly Sym[]>(productions: P[]): P[] {
	const seen = new Set<string>()
	return productions.filter(production => {
		const key = Production.key(production)
		if (seen.has(key))
			return false
		seen.add(key)
		return true
	})
}
