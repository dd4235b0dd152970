import {GlyphNameIndex, parsePost} from './post';
import {StrikeExtractor, StrikeGlyph, parseSbix} from './sbix';
import {TableDirectory, parseContainer, tableReader} from './sfnt';

export interface GlyphBitmap extends StrikeGlyph {
	name:	string;
}

export interface OpenOptions {
	size:		number;		//ppem of the strike to extract
	fontIndex?:	number;		//font within a collection
}

//-----------------------------------------------------------------------------
//	EmojiFont
//-----------------------------------------------------------------------------

/**
 * One font of a TTC/SFNT file with its glyph names and a single `sbix` strike.
 * All indices are built in {@link EmojiFont.open} and never change afterwards.
 */
export class EmojiFont {
	constructor(readonly tables: TableDirectory, readonly names: GlyphNameIndex, readonly strike: StrikeExtractor) {}

	static open(data: Uint8Array, options: OpenOptions) {
		const tables	= parseContainer(data, options.fontIndex);
		const names		= parsePost(tableReader(data, tables, 'post', 'post'));
		const strike	= parseSbix(tableReader(data, tables, 'sbix', 'sbix'), options.size, names.numGlyphs);
		return new EmojiFont(tables, names, strike);
	}

	get numGlyphs() {
		return this.names.numGlyphs;
	}

	get ppem() {
		return this.strike.strike.ppem;
	}

	nameFor(glyphId: number) {
		return this.names.nameFor(glyphId);
	}

	bitmapFor(glyphId: number): GlyphBitmap | undefined {
		const name = this.names.nameFor(glyphId);
		if (name === undefined)
			return;
		const image = this.strike.bitmapFor(glyphId);
		return image && {...image, name};
	}

	//glyphs with an image at this strike, in glyph id order
	*glyphs(): IterableIterator<GlyphBitmap> {
		for (const [id] of this.names) {
			const bitmap = this.bitmapFor(id);
			if (bitmap)
				yield bitmap;
		}
	}
}
