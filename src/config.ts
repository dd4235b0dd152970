import {z} from 'zod';
import {LOG_LEVELS} from './logger';

export const DEFAULT_SIZE = 160;

export const OptionsSchema = z.object({
	font:			z.string().min(1).describe('TTC or TTF file with an sbix table'),
	output:			z.string().min(1).describe('Directory receiving unicode/ and raw/'),
	size:			z.coerce.number().int().positive().default(DEFAULT_SIZE).describe('ppem of the strike to extract'),
	fontIndex:		z.coerce.number().int().nonnegative().default(0).describe('Font within a collection'),
	sequences:		z.string().min(1).optional().describe('emoji-sequences.txt for the skin tone pass'),
	keepUnresolved:	z.boolean().default(false).describe('Also write glyphs without a Unicode sequence under raw/'),
	clean:			z.boolean().default(true).describe('Remove unicode/ and raw/ left by an earlier run'),
	logLevel:		z.enum(LOG_LEVELS).default('info'),
});

export type Options		= z.infer<typeof OptionsSchema>;
export type OptionsInput	= z.input<typeof OptionsSchema>;

export function parseOptions(input: unknown): Options {
	return OptionsSchema.parse(input);
}
