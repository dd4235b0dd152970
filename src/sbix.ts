import * as binary from '@isopodlabs/binary';
import {MalformedFont, StrikeNotFound} from './errors';
import {Reader, TAG, s16, u16, u32} from './reader';

//-----------------------------------------------------------------------------
//	sbix	Standard Bitmap Graphics Table
//-----------------------------------------------------------------------------

const sbix = {
	version:	u16,	//1
	flags:		u16,	//bit 1: draw outlines
	numStrikes:	u32,
};
const SBIX_HEADER_SIZE = 8;

const StrikeHeader = {
	ppem:		u16,	//The PPEM size for which this strike was designed.
	ppi:		u16,	//The device pixel density (in PPI) for which this strike was designed. (E.g., 96 PPI, 192 PPI.)
};
const STRIKE_HEADER_SIZE = 4;

const GlyphRecord = {
	x:			s16,	//The position of the left edge of the bitmap graphic in relation to the glyph design space origin.
	y:			s16,
	graphicType:TAG,	//one of 'jpg ', 'png ' or 'tiff', or 'dupe' (which indicates data is a uint16be glyphid)
};
const GLYPH_RECORD_SIZE = 8;

export interface StrikeInfo {
	ppem:		number;
	resolution:	number;
	offset:		number;		//from the start of the sbix table
}

export interface BitmapStrike extends StrikeInfo {
	glyphDataOffsets: readonly number[];	//numGlyphs + 1 entries, relative to the strike
}

/**
 * Byte range of an embedded image within the font file.
 * Nothing is copied until {@link BitmapRef.read} is called.
 */
export class BitmapRef {
	constructor(readonly source: Uint8Array, readonly start: number, readonly end: number) {}

	get length() {
		return this.end - this.start;
	}

	read(): Uint8Array {
		return this.source.slice(this.start, this.end);
	}
}

export interface StrikeGlyph {
	glyphId:		number;
	origin:			{x: number, y: number};
	graphicType:	string;
	ref:			BitmapRef;
	dupeOf?:		number;
}

export class StrikeExtractor {
	constructor(private readonly table: Reader, readonly strike: BitmapStrike) {}

	get numGlyphs() {
		return this.strike.glyphDataOffsets.length - 1;
	}

	//the glyph's record within the table, or undefined for an empty glyph
	private record(glyphId: number) {
		const offsets	= this.strike.glyphDataOffsets;
		const begin		= offsets[glyphId];
		const end		= offsets[glyphId + 1];
		if (begin === undefined || end === undefined || begin >= end)
			return;

		const at = this.strike.offset + begin;
		if (end - begin < GLYPH_RECORD_SIZE)
			throw new MalformedFont('sbix', `glyph ${glyphId} record of ${end - begin} bytes is shorter than its header`, this.table.absolute(at));
		this.table.check(at, end - begin, `glyph ${glyphId} data`);
		return {at, length: end - begin};
	}

	private decode(glyphId: number) {
		const rec = this.record(glyphId);
		if (!rec)
			return;
		const head	= binary.read(this.table.stream(rec.at, GLYPH_RECORD_SIZE, `glyph ${glyphId} header`), GlyphRecord);
		const data	= this.table.absolute(rec.at + GLYPH_RECORD_SIZE);
		return {
			glyphId,
			origin:			{x: head.x, y: head.y},
			graphicType:	head.graphicType,
			ref:			new BitmapRef(this.table.data, data, data + rec.length - GLYPH_RECORD_SIZE),
		};
	}

	bitmapFor(glyphId: number): StrikeGlyph | undefined {
		const bitmap = this.decode(glyphId);
		if (!bitmap || bitmap.graphicType !== 'dupe')
			return bitmap;

		const at = bitmap.ref.start - this.table.start;
		if (bitmap.ref.length < 2)
			throw new MalformedFont('sbix', `glyph ${glyphId} dupe record has no target`, bitmap.ref.start);
		const target = this.table.uint16(at);
		const actual = this.decode(target);
		if (!actual || actual.graphicType === 'dupe')
			throw new MalformedFont('sbix', `glyph ${glyphId} duplicates glyph ${target}, which has no image`, this.table.absolute(at));
		return {...actual, glyphId, dupeOf: target};
	}
}

function strikeOffsets(table: Reader) {
	const head = binary.read(table.stream(0, SBIX_HEADER_SIZE, 'sbix header'), sbix);
	return table.uint32s(SBIX_HEADER_SIZE, head.numStrikes, 'strike offsets');
}

function readStrike(table: Reader, offset: number): StrikeInfo {
	const strike = binary.read(table.stream(offset, STRIKE_HEADER_SIZE, 'strike header'), StrikeHeader);
	return {ppem: strike.ppem, resolution: strike.ppi, offset};
}

export function readStrikes(table: Reader): StrikeInfo[] {
	return strikeOffsets(table).map(offset => readStrike(table, offset));
}

/** Select the first strike drawn for `ppem`; strikes after it are never read. */
export function parseSbix(table: Reader, ppem: number, numGlyphs: number): StrikeExtractor {
	let info: StrikeInfo | undefined;
	for (const offset of strikeOffsets(table)) {
		const strike = readStrike(table, offset);
		if (strike.ppem === ppem) {
			info = strike;
			break;
		}
	}
	if (!info)
		throw new StrikeNotFound(ppem, readStrikes(table).map(i => i.ppem), table.absolute(0));

	const glyphDataOffsets = table.uint32s(info.offset + STRIKE_HEADER_SIZE, numGlyphs + 1, 'glyph data offsets');
	return new StrikeExtractor(table, {...info, glyphDataOffsets});
}
