import type {Emoji} from './database';
import type {EmojiFont, GlyphBitmap} from './font';
import type {Logger} from './logger';
import {SequenceResolver, includesSequence} from './resolver';
import {CodepointSequence, FEMALE_SIGN, MALE_SIGN, SKIN_TONES, VS16, ZWJ, assetId, formatSequence, hasSkinTone, toText} from './sequence';
import type {AssetSink} from './sink';

//-----------------------------------------------------------------------------
//	Modifier bases
//-----------------------------------------------------------------------------

const MODIFIER_SEQUENCE	= 'Emoji_Modifier_Sequence';
const LEADING_HEX		= /^[0-9A-F]{4,5}/;

/** Code points that take a skin tone modifier, read from emoji-sequences.txt. */
export class ModifierBases {
	private readonly bases: ReadonlySet<number>;

	constructor(bases: Iterable<number>) {
		this.bases = new Set(bases);
	}

	static fromLines(lines: Iterable<string>) {
		const bases: number[] = [];
		for (const line of lines) {
			if (!line.includes(MODIFIER_SEQUENCE))
				continue;
			const m = LEADING_HEX.exec(line);
			if (m)
				bases.push(parseInt(m[0], 16));
		}
		return new ModifierBases(bases);
	}

	static fromText(text: string) {
		return ModifierBases.fromLines(text.split(/\r?\n/));
	}

	get size() {
		return this.bases.size;
	}

	has(cp: number) {
		return this.bases.has(cp);
	}

	/**
	 * The skin toned sequences a font should expose for an emoji.
	 * An emoji containing the male sign gets its 5 male forms; any other gets the 5 plain forms and the 5 female forms.
	 */
	sequencesFor(chars: CodepointSequence): CodepointSequence[] {
		const base = chars[0];
		if (base === undefined || !this.has(base))
			return [];

		if (chars.includes(MALE_SIGN))
			return SKIN_TONES.map(tone => [base, tone, ZWJ, MALE_SIGN, VS16]);

		return [
			...SKIN_TONES.map(tone => [base, tone]),
			...SKIN_TONES.map(tone => [base, tone, ZWJ, FEMALE_SIGN, VS16]),
		];
	}
}

//-----------------------------------------------------------------------------
//	Enumerator
//-----------------------------------------------------------------------------

const TONED_NAME = /\.[1-5]($|\.)/;

interface Candidates {
	glyphId:	number;
	toned:		boolean;
	candidates:	readonly CodepointSequence[];
}

export interface SynthesisResult {
	written:	number;
	existing:	number;
	missing:	number;
}

/**
 * Finds the glyphs that draw skin toned sequences but are named after something else,
 * and writes them under the sequence they draw.
 */
export class ModifierSequenceEnumerator {
	private cache?: Candidates[];

	constructor(readonly bases: ModifierBases, readonly font: EmojiFont, readonly resolver: SequenceResolver, readonly logger?: Logger) {}

	//candidate sets of every glyph with a bitmap, computed on first use
	private glyphs() {
		if (!this.cache) {
			this.cache = [];
			for (const glyph of this.font.glyphs()) {
				this.cache.push({
					glyphId:	glyph.glyphId,
					toned:		TONED_NAME.test(glyph.name),
					candidates:	this.resolver.candidatesFor(glyph.name),
				});
			}
		}
		return this.cache;
	}

	findBitmap(sequence: CodepointSequence): GlyphBitmap | undefined {
		const toned = hasSkinTone(sequence);
		for (const glyph of this.glyphs()) {
			if (toned && !glyph.toned)
				continue;
			if (includesSequence(glyph.candidates, sequence))
				return this.font.bitmapFor(glyph.glyphId);
		}
	}

	async synthesize(emojis: Iterable<Emoji>, sink: AssetSink): Promise<SynthesisResult> {
		const result	= {written: 0, existing: 0, missing: 0};
		const seen		= new Set<string>();

		for (const emoji of emojis) {
			for (const sequence of this.bases.sequencesFor(emoji.sequence)) {
				const key = toText(sequence);
				if (seen.has(key))
					continue;
				seen.add(key);

				const id = assetId(sequence);
				if (await sink.has(id)) {
					++result.existing;
					continue;
				}

				const bitmap = this.findBitmap(sequence);
				if (!bitmap) {
					++result.missing;
					continue;
				}

				await sink.write(id, bitmap);
				this.logger?.debug('modifiers', 'synthesized', {sequence: formatSequence(sequence), glyph: bitmap.name, label: emoji.label});
				++result.written;
			}
		}
		return result;
	}
}
