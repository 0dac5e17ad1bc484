import { Dict } from '@ts-std/types'

import { EPSILON, Grammar, Sym } from './grammar'

type Word = readonly Sym[]

function concat_bounded(lefts: Word[], rights: Word[], max_length: number) {
	const words = [] as Word[]
	for (const left of lefts)
		for (const right of rights)
			if (left.length + right.length <= max_length)
				words.push([...left, ...right])

	return words
}

/**
 * The terminal words of at most `max_length` symbols that `grammar` derives from its
 * start variable, each rendered as its concatenated symbols and sorted by length then
 * lexically. The empty word is `''`.
 *
 * Computed as a least fixed point over every variable, so it terminates on left
 * recursive, cyclic and ε-laden grammars alike.
 */
export function derive_strings(grammar: Grammar, max_length: number): string[] {
	const languages = {} as Dict<Map<string, Word>>
	for (const variable of grammar.variables)
		languages[variable] = new Map()

	function words_of(sym: Sym): Word[] {
		if (sym === EPSILON)
			return [[]]
		if (grammar.is_variable(sym))
			return [...(languages[sym] || new Map<string, Word>()).values()]
		return max_length >= 1 ? [[sym]] : []
	}

	let changed = true
	while (changed) {
		changed = false
		for (const [variable, productions] of grammar.rules) {
			const language = languages[variable]
			for (const production of productions) {
				let words: Word[] = [[]]
				for (const sym of production)
					words = concat_bounded(words, words_of(sym), max_length)

				for (const word of words) {
					const key = JSON.stringify(word)
					if (!language.has(key)) {
						language.set(key, word)
						changed = true
					}
				}
			}
		}
	}

	const start_language = languages[grammar.start_variable] || new Map<string, Word>()
	return [...start_language.values()]
		.sort((a, b) => a.length - b.length || compare(a.join(''), b.join('')))
		.map(word => word.join(''))
}

function compare(left: string, right: string) {
	return left < right ? -1 : left > right ? 1 : 0
}
