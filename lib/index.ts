export { EPSILON, Grammar, Production, Sym } from './grammar'
export type { GrammarDeclaration, RuleDeclaration } from './grammar'
export { InvalidRuleName, InvalidGrammar, CnfViolation } from './error'
export { generate_combinations } from './combinations'
export { VariableMinter } from './fresh'
export * from './normalize'
export { check_cnf, find_cnf_problems, describe_problem } from './validate'
export type { CnfProblem } from './validate'
export { derive_strings } from './language'
export { render_grammar, render_rule, render_production } from './render'
export { parse_grammar, tokenize_production } from './parse'
