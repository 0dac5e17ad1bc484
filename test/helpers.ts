import { Grammar } from '../lib/grammar'
import { parse_grammar } from '../lib/parse'
import { render_grammar } from '../lib/render'

export function grammar_of(source: string, start_variable?: string) {
	return Grammar.from_declaration(parse_grammar(source, start_variable).unwrap())
}

export function lines_of(grammar: Grammar) {
	return render_grammar(grammar).split('\n')
}
