import * as binary from '@isopodlabs/binary';
import {MalformedFont, Stage} from './errors';

export const TAG	= binary.StringType(4);
export const u16	= binary.UINT16_BE;
export const s16	= binary.INT16_BE;
export const u32	= binary.UINT32_BE;

//-----------------------------------------------------------------------------
//	Reader
//-----------------------------------------------------------------------------

/**
 * A window onto the font file.
 *
 * Offsets passed to a reader are relative to its own start; errors report the absolute file offset.
 * Every read is checked against the window before any bytes reach `@isopodlabs/binary`, so a short read
 * surfaces as {@link MalformedFont} instead of a half-decoded structure.
 */
export class Reader {
	readonly start:		number;
	readonly length:	number;

	constructor(readonly data: Uint8Array, readonly stage: Stage, start = 0, length = data.length - start) {
		if (start < 0 || length < 0 || start + length > data.length)
			throw new MalformedFont(stage, `region of ${length} bytes exceeds file of ${data.length} bytes`, start);
		this.start	= start;
		this.length	= length;
	}

	absolute(offset: number) {
		return this.start + offset;
	}

	check(offset: number, size: number, what: string) {
		if (offset < 0 || size < 0 || offset + size > this.length)
			throw new MalformedFont(this.stage, `truncated ${what}`, this.absolute(offset));
	}

	stream(offset: number, size: number, what: string) {
		return new binary.stream(this.bytes(offset, size, what));
	}

	bytes(offset: number, size: number, what: string) {
		this.check(offset, size, what);
		const begin = this.absolute(offset);
		return this.data.subarray(begin, begin + size);
	}

	tag(offset: number) {
		return TAG.get(this.stream(offset, 4, 'tag'));
	}

	uint16(offset: number) {
		return u16.get(this.stream(offset, 2, 'uint16'));
	}

	uint16s(offset: number, count: number, what: string) {
		return binary.readn(this.stream(offset, count * 2, what), u16, count);
	}

	uint32s(offset: number, count: number, what: string) {
		return binary.readn(this.stream(offset, count * 4, what), u32, count);
	}
}
