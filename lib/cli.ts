import { readFileSync, writeFileSync } from 'fs'

import { Grammar } from './grammar'
import { parse_grammar } from './parse'
import { normalize } from './normalize'
import { render_grammar } from './render'
import { format_error } from './error'

export type CliArgs = {
	input_filename: string | undefined,
	output_filename: string | undefined,
	start_variable: string | undefined,
	fresh_prefix: string | undefined,
	prune: boolean,
	trace: boolean,
}

export function parse_args(argv: string[]): CliArgs {
	const args: CliArgs = {
		input_filename: undefined, output_filename: undefined,
		start_variable: undefined, fresh_prefix: undefined,
		prune: false, trace: false,
	}

	const positional = [] as string[]
	const remaining = argv.slice()
	let arg: string | undefined
	while ((arg = remaining.shift()) !== undefined) switch (arg) {
	case '--prune': args.prune = true; continue
	case '--trace': args.trace = true; continue
	case '--start': args.start_variable = remaining.shift(); continue
	case '--prefix': args.fresh_prefix = remaining.shift(); continue
	default: positional.push(arg)
	}

	args.input_filename = positional[0]
	args.output_filename = positional[1]
	return args
}

export function run(argv: string[]) {
	const { input_filename, output_filename, start_variable, fresh_prefix, prune, trace } = parse_args(argv)
	if (input_filename === undefined)
		throw new Error("no input filename provided")

	const source = readFileSync(input_filename, 'utf-8')
	const declaration = parse_grammar(source, start_variable).match({
		ok: declaration => declaration,
		err: message => { throw new Error(`${input_filename}: ${message}`) },
	})

	const grammar = normalize(Grammar.from_declaration(declaration), { fresh_prefix, prune, trace })
	const rendered = render_grammar(grammar) + '\n'

	if (output_filename === undefined)
		process.stdout.write(rendered)
	else
		writeFileSync(output_filename, rendered)
}

if (require.main === module) {
	try {
		run(process.argv.slice(2))
	}
	catch (e) {
		process.stderr.write(format_error('could not normalize the grammar', e) + '\n')
		process.exitCode = 1
	}
}
