import 'mocha'
import { expect } from 'chai'

import { EPSILON, Grammar, Production, Sym } from './grammar'
import { InvalidGrammar, InvalidRuleName } from './error'

describe('Sym.is_variable_name', () => it('works', () => {
	expect(Sym.is_variable_name('S')).true
	expect(Sym.is_variable_name('S0')).true
	expect(Sym.is_variable_name('U12')).true

	expect(Sym.is_variable_name('s')).false
	expect(Sym.is_variable_name('SS')).false
	expect(Sym.is_variable_name('0S')).false
	expect(Sym.is_variable_name(EPSILON)).false
}))

describe('Production.normalize', () => it('works', () => {
	expect(Production.normalize([])).eql([EPSILON])
	expect(Production.normalize([EPSILON])).eql([EPSILON])
	expect(Production.normalize(['a', EPSILON, 'B'])).eql(['a', 'B'])
	expect(Production.normalize(['a', 'B'])).eql(['a', 'B'])
}))

describe('Grammar constructor', () => {
	it('promotes undeclared symbols by their casing', () => {
		const grammar = new Grammar(['S'], ['a'], { S: [['a', 'S', 'b'], [EPSILON]] }, 'S')
		expect([...grammar.variables]).eql(['S'])
		expect([...grammar.terminals]).eql(['a', 'b', EPSILON])
	})

	it('accepts forward references', () => {
		const grammar = new Grammar(['S'], [], { S: [['A', 'b']] }, 'S')
		expect([...grammar.variables]).eql(['S', 'A'])
		expect(grammar.rules.has('A')).false
		expect(grammar.is_variable('A')).true
		expect(grammar.is_terminal('b')).true
	})

	it('keeps declared terminals that look like variables', () => {
		const grammar = new Grammar(['S'], ['X'], { S: [['X']] }, 'S')
		expect(grammar.is_variable('X')).false
		expect(grammar.is_terminal('X')).true
	})

	it('removes duplicate productions', () => {
		const grammar = new Grammar(['S'], [], { S: [['a'], ['a'], ['b']] }, 'S')
		expect(grammar.productions_of('S')).eql([['a'], ['b']])
	})

	it('puts the start rule first', () => {
		const grammar = new Grammar(['A', 'S'], [], { A: [['a']], S: [['A']] }, 'S')
		expect([...grammar.rules.keys()]).eql(['S', 'A'])
	})

	it('rejects malformed declarations', () => {
		expect(() => new Grammar(['S'], [], { S: [['a']], x: [['a']] }, 'S')).throw(InvalidRuleName)
		expect(() => new Grammar(['S', 'ab'], [], { S: [['a']] }, 'S')).throw(InvalidRuleName)
		expect(() => new Grammar(['S'], [], { A: [['a']] }, 'S')).throw(InvalidGrammar)
		expect(() => new Grammar(['S', 'A'], ['A'], { S: [['a']] }, 'S')).throw(InvalidGrammar)
	})
})

describe('Grammar.add_rule', () => {
	it('fails on a lowercase left-hand side without touching the grammar', () => {
		const grammar = new Grammar(['S'], [], { S: [['a']] }, 'S')
		expect(() => grammar.add_rule('s', [['B', 'c']])).throw(InvalidRuleName)
		expect([...grammar.variables]).eql(['S'])
		expect([...grammar.terminals]).eql(['a'])
		expect([...grammar.rules.keys()]).eql(['S'])
	})

	it('registers the rule and its symbols', () => {
		const grammar = new Grammar(['S'], [], { S: [['a']] }, 'S')
		grammar.add_rule('T1', [['B', 'c'], [], ['B', 'c']])
		expect(grammar.productions_of('T1')).eql([['B', 'c'], [EPSILON]])
		expect([...grammar.variables]).eql(['S', 'B', 'T1'])
		expect([...grammar.terminals]).eql(['a', 'c', EPSILON])
	})
})

describe('Grammar.add_production', () => it('is idempotent', () => {
	const grammar = new Grammar(['S'], [], { S: [['a']] }, 'S')
	grammar.add_production('S', ['a'])
	grammar.add_production('S', ['b'])
	grammar.add_production('S', ['b'])
	grammar.add_production('A', ['a'])

	expect(grammar.productions_of('S')).eql([['a'], ['b']])
	expect(grammar.productions_of('A')).eql([['a']])
	expect(grammar.is_variable('A')).true
}))

describe('Grammar.remove_production', () => it('works', () => {
	const grammar = new Grammar(['S'], [], { S: [['a'], ['b']] }, 'S')
	expect(grammar.remove_production('S', ['a'])).true
	expect(grammar.remove_production('S', ['a'])).false
	expect(grammar.remove_production('A', ['a'])).false
	expect(grammar.productions_of('S')).eql([['b']])
}))

describe('Grammar.find_sole_owner', () => it('skips the start variable and variables with several productions', () => {
	const grammar = new Grammar(['S', 'A', 'B'], [], {
		S: [['a', 'b']],
		A: [['a']],
		B: [['b'], ['c']],
	}, 'S')

	expect(grammar.find_sole_owner(['a']).to_undef()).eql('A')
	expect(grammar.find_sole_owner(['b']).is_none()).true
	expect(grammar.find_sole_owner(['a', 'b']).is_none()).true
}))

describe('Grammar.clone', () => it('copies deeply', () => {
	const grammar = new Grammar(['S'], [], { S: [['a', 'S']] }, 'S')
	const copy = grammar.clone()

	copy.add_rule('A', [['b']])
	copy.productions_of('S')[0].push('c')
	copy.start_variable = 'A'

	expect(grammar.productions_of('S')).eql([['a', 'S']])
	expect(grammar.rules.has('A')).false
	expect(grammar.start_variable).eql('S')
	expect([...copy.rules.keys()]).eql(['S', 'A'])
}))
