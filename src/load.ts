//-----------------------------------------------------------------------------
//	Load Font
//-----------------------------------------------------------------------------

import * as fs from 'fs/promises';
import type {Options} from './config';
import {EmojiDatabase, emojibaseDatabase} from './database';
import {ExtractReport, Extractor} from './extract';
import {EmojiFont, OpenOptions} from './font';
import {Logger} from './logger';
import {ModifierBases} from './modifiers';
import {DirectorySink} from './sink';

export async function loadFont(filename: string, options: OpenOptions): Promise<EmojiFont> {
	const data = await fs.readFile(filename);
	return EmojiFont.open(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), options);
}

export async function loadModifierBases(filename: string): Promise<ModifierBases> {
	return ModifierBases.fromText(await fs.readFile(filename, 'utf8'));
}

/** Extract `options.font` into `options.output`, resolving names against `database`. */
export async function extractFile(options: Options, database: EmojiDatabase = emojibaseDatabase()): Promise<ExtractReport> {
	const logger	= new Logger(options.logLevel);
	const font		= await loadFont(options.font, {size: options.size, fontIndex: options.fontIndex});
	const bases		= options.sequences ? await loadModifierBases(options.sequences) : undefined;
	const sink		= new DirectorySink(options.output);

	if (options.clean)
		await sink.clean();

	return new Extractor(font, database, sink, {bases, keepUnresolved: options.keepUnresolved, logger}).run();
}
