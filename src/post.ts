import * as binary from '@isopodlabs/binary';
import {MalformedFont, UnsupportedPostFormat} from './errors';
import {Reader, s16, u32} from './reader';
import macGlyphNames from './mac-glyph-names.json';

//-----------------------------------------------------------------------------
//	post	PostScript Table
//-----------------------------------------------------------------------------

const post = {
	version:			u32,	//16.16 fixed; only 0x00020000 carries glyph names
	italicAngle:		u32,
	underlinePosition:	s16,
	underlineThickness:	s16,
	isFixedPitch:		u32,
	minMemType42:		u32,
	maxMemType42:		u32,
	minMemType1:		u32,
	maxMemType1:		u32,
};
const POST_HEADER_SIZE		= 32;
const POST_VERSION_2		= 0x00020000;

//names below this index come from the standard Macintosh glyph order
export const NUM_MAC_GLYPHS	= macGlyphNames.length;

function fixedVersion(v: number) {
	return `${v >>> 16}.${v & 0xffff}`;
}

export class GlyphNameIndex {
	constructor(private readonly names: readonly string[]) {}

	get numGlyphs() {
		return this.names.length;
	}

	nameFor(glyphId: number): string | undefined {
		return this.names[glyphId];
	}

	*[Symbol.iterator](): IterableIterator<[number, string]> {
		for (let i = 0; i < this.names.length; i++)
			yield [i, this.names[i]];
	}
}

function readPool(table: Reader, offset: number, needed: number) {
	const pool: string[] = [];
	while (offset < table.length) {
		const length	= table.bytes(offset, 1, 'name length')[0];
		const bytes		= table.bytes(offset + 1, length, `glyph name ${pool.length}`);
		pool.push(binary.utils.decodeText(bytes));
		offset += 1 + length;
	}
	if (pool.length < needed)
		throw new MalformedFont('post', `glyph name pool holds ${pool.length} names but ${needed} are referenced`, table.absolute(offset));
	return pool;
}

export function parsePost(table: Reader): GlyphNameIndex {
	const head = binary.read(table.stream(0, POST_HEADER_SIZE, 'post header'), post);
	if (head.version !== POST_VERSION_2)
		throw new UnsupportedPostFormat(fixedVersion(head.version), table.absolute(0));

	const numGlyphs	= table.uint16(POST_HEADER_SIZE);
	const indices	= table.uint16s(POST_HEADER_SIZE + 2, numGlyphs, 'glyph name indices');
	const needed	= indices.reduce((max, i) => Math.max(max, i - NUM_MAC_GLYPHS + 1), 0);
	const pool		= readPool(table, POST_HEADER_SIZE + 2 + numGlyphs * 2, needed);

	return new GlyphNameIndex(indices.map(i => i < NUM_MAC_GLYPHS ? macGlyphNames[i] : pool[i - NUM_MAC_GLYPHS]));
}
