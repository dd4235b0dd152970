import type {EmojiDatabase} from './database';
import type {EmojiFont} from './font';
import {Logger} from './logger';
import {ModifierBases, ModifierSequenceEnumerator, SynthesisResult} from './modifiers';
import {SequenceResolver} from './resolver';
import {assetId} from './sequence';
import type {AssetSink} from './sink';

export interface ExtractorOptions {
	bases?:				ModifierBases;	//no skin tone pass without them
	keepUnresolved?:	boolean;
	logger?:			Logger;
}

export interface ExtractReport {
	glyphs:			number;		//glyphs with an image at the strike
	written:		number;
	skipped:		number;		//resolved to an asset that was already written
	unresolved:		string[];
	synthesized?:	SynthesisResult;
}

//-----------------------------------------------------------------------------
//	Extractor
//-----------------------------------------------------------------------------

export class Extractor {
	readonly resolver:	SequenceResolver;
	readonly logger:	Logger;

	constructor(readonly font: EmojiFont, readonly database: EmojiDatabase, readonly sink: AssetSink, readonly options: ExtractorOptions = {}) {
		this.resolver	= new SequenceResolver(database);
		this.logger		= options.logger ?? new Logger('silent');
	}

	//pass 1: every glyph under the sequence its name resolves to
	async exportGlyphs(): Promise<ExtractReport> {
		const report: ExtractReport = {glyphs: 0, written: 0, skipped: 0, unresolved: []};

		for (const glyph of this.font.glyphs()) {
			++report.glyphs;
			const emoji = this.resolver.resolve(glyph.name);
			if (!emoji) {
				report.unresolved.push(glyph.name);
				this.logger.debug('extract', 'unresolved glyph name', {glyph: glyph.glyphId, name: glyph.name});
				if (this.options.keepUnresolved)
					await this.sink.writeRaw(glyph.name, glyph);
				continue;
			}

			if (await this.sink.write(assetId(emoji.sequence), glyph))
				++report.written;
			else
				++report.skipped;
		}
		return report;
	}

	//pass 2: skin toned sequences only reachable through other glyph names
	async exportModifierSequences(): Promise<SynthesisResult | undefined> {
		const bases = this.options.bases;
		if (!bases)
			return;
		const enumerator = new ModifierSequenceEnumerator(bases, this.font, this.resolver, this.logger);
		return enumerator.synthesize(this.database.all(), this.sink);
	}

	async run(): Promise<ExtractReport> {
		this.logger.info('extract', 'exporting glyphs', {ppem: this.font.ppem, glyphs: this.font.numGlyphs});
		const report = await this.exportGlyphs();
		this.logger.info('extract', 'exported glyphs', {written: report.written, skipped: report.skipped, unresolved: report.unresolved.length});

		if (this.options.bases) {
			this.logger.info('extract', 'exporting modifier sequences', {bases: this.options.bases.size});
			report.synthesized = await this.exportModifierSequences();
			this.logger.info('extract', 'exported modifier sequences', {...report.synthesized});
		}
		return report;
	}
}
