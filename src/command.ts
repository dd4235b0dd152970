import {parseArgs} from 'util';
import {parseOptions} from './config';
import {extractFile} from './load';

export const USAGE = `usage: sbix-emoji <font> <output-dir> [options]

  --size <ppem>            strike to extract (default 160)
  --font-index <n>         font within a collection (default 0)
  --sequences <file>       emoji-sequences.txt; enables the skin tone pass
  --keep-unresolved        write glyphs without a Unicode sequence to raw/
  --no-clean               keep files from an earlier run
  --log-level <level>      silent, error, warn, info or debug (default info)`;

export async function main(argv: string[]) {
	const {values, positionals} = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			'size':				{type: 'string'},
			'font-index':		{type: 'string'},
			'sequences':		{type: 'string'},
			'keep-unresolved':	{type: 'boolean'},
			'no-clean':			{type: 'boolean'},
			'log-level':		{type: 'string'},
			'help':				{type: 'boolean', short: 'h'},
		},
	});

	if (values.help) {
		console.log(USAGE);
		return 0;
	}
	if (positionals.length !== 2) {
		console.error(USAGE);
		return 1;
	}

	const options = parseOptions({
		font:			positionals[0],
		output:			positionals[1],
		size:			values['size'],
		fontIndex:		values['font-index'],
		sequences:		values['sequences'],
		keepUnresolved:	values['keep-unresolved'] ?? false,
		clean:			!values['no-clean'],
		logLevel:		values['log-level'],
	});

	const report = await extractFile(options);
	console.log(`${report.written} of ${report.glyphs} glyphs written, ${report.unresolved.length} unresolved`
		+ (report.synthesized ? `, ${report.synthesized.written} skin tone sequences synthesized` : ''));
	return 0;
}
