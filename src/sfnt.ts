import * as binary from '@isopodlabs/binary';
import {MalformedFont, Stage} from './errors';
import {Reader, TAG, u16, u32} from './reader';

//-----------------------------------------------------------------------------
//	TTC
//-----------------------------------------------------------------------------

const TTCHeader = {
	tag:			TAG,	// TrueType Collection ID string: 'ttcf'
	version:		u32,	// Version of the TTC Header (1.0), 0x00010000 or (2.0), 0x00020000
	num_fonts:		u32,
};
const TTC_HEADER_SIZE = 12;

/** Offsets of every font in a collection, or `[0]` for a plain SFNT file. */
export function fontOffsets(file: Reader): number[] {
	if (file.tag(0) !== 'ttcf')
		return [0];

	const head = binary.read(file.stream(0, TTC_HEADER_SIZE, 'TTC header'), TTCHeader);
	return file.uint32s(TTC_HEADER_SIZE, head.num_fonts, 'TTC font offsets');
}

//-----------------------------------------------------------------------------
//	SFNT table directory
//-----------------------------------------------------------------------------

const SFNTHeader = {
	version:		u32,	// 0x00010000 for version 1.0 (or 'true' or 'typ1'); 'OTTO' for opentype
	num_tables:		u16,	// Number of tables.
	search_range:	u16,	// (Maximum power of 2 <= numTables) x 16.
	entry_selector:	u16,	// Log2(maximum power of 2 <= numTables).
	range_shift:	u16,	// NumTables x 16-searchRange.
};
const SFNT_HEADER_SIZE	= 12;

const TableRecord = {
	tag:			TAG,	// 4 -byte identifier.
	checksum:		u32,	// CheckSum for this table.
	offset:			u32,	// Offset from beginning of TrueType font file.
	length:			u32,	// Length of this table.
};
const TABLE_RECORD_SIZE	= 16;

const SFNT_VERSIONS = [0x00010000, binary.utils.stringCode('true'), binary.utils.stringCode('typ1'), binary.utils.stringCode('OTTO')];

export type FontTable = binary.ReadType<typeof TableRecord>;
export type TableDirectory = ReadonlyMap<string, FontTable>;

export function parseTableDirectory(file: Reader, start: number): TableDirectory {
	const sfnt = binary.read(file.stream(start, SFNT_HEADER_SIZE, 'sfnt header'), SFNTHeader);
	if (!SFNT_VERSIONS.includes(sfnt.version))
		throw new MalformedFont('container', `unrecognised sfnt version 0x${sfnt.version.toString(16).padStart(8, '0')}`, file.absolute(start));

	const tables	= new Map<string, FontTable>();
	const records	= start + SFNT_HEADER_SIZE;
	for (let i = 0; i < sfnt.num_tables; i++) {
		const at	= records + i * TABLE_RECORD_SIZE;
		const table	= binary.read(file.stream(at, TABLE_RECORD_SIZE, `table record ${i}`), TableRecord);
		if (table.offset + table.length > file.length)
			throw new MalformedFont('container', `table '${table.tag}' (${table.length} bytes at ${table.offset}) lies outside the file`, file.absolute(at));
		tables.set(table.tag, table);
	}
	return tables;
}

/**
 * Table directory of one font in a TTC or SFNT file.
 * `fontIndex` selects the font inside a collection and must be 0 for a single font.
 */
export function parseContainer(data: Uint8Array, fontIndex = 0): TableDirectory {
	const file		= new Reader(data, 'container');
	const offsets	= fontOffsets(file);
	if (fontIndex < 0 || fontIndex >= offsets.length)
		throw new MalformedFont('container', `font index ${fontIndex} not in collection of ${offsets.length}`);
	return parseTableDirectory(file, offsets[fontIndex]);
}

export function requireTable(tables: TableDirectory, tag: string, stage: Stage): FontTable {
	const table = tables.get(tag);
	if (!table)
		throw new MalformedFont(stage, `missing required '${tag}' table`);
	return table;
}

export function tableReader(data: Uint8Array, tables: TableDirectory, tag: string, stage: Stage) {
	const table = requireTable(tables, tag, stage);
	return new Reader(data, stage, table.offset, table.length);
}
