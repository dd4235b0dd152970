//-----------------------------------------------------------------------------
//	Codepoint sequences
//-----------------------------------------------------------------------------

export type CodepointSequence = readonly number[];

export const ZWJ			= 0x200D;	//zero width joiner
export const VS16			= 0xFE0F;	//emoji presentation selector
export const MALE_SIGN		= 0x2642;
export const FEMALE_SIGN	= 0x2640;
export const HEART			= 0x2764;
export const KISS_MARK		= 0x1F48B;

//Fitzpatrick types 1-2 to 6, in the order the font's digit suffixes .1 to .5 use
export const SKIN_TONES		= [0x1F3FB, 0x1F3FC, 0x1F3FD, 0x1F3FE, 0x1F3FF] as const;

export function isSkinTone(cp: number) {
	return cp >= SKIN_TONES[0] && cp <= SKIN_TONES[4];
}

export function hasSkinTone(seq: CodepointSequence) {
	return seq.some(isSkinTone);
}

export function toText(seq: CodepointSequence) {
	return String.fromCodePoint(...seq);
}

export function fromText(text: string): number[] {
	const seq: number[] = [];
	for (const c of text) {
		const cp = c.codePointAt(0);
		if (cp !== undefined)
			seq.push(cp);
	}
	return seq;
}

export function sameSequence(a: CodepointSequence, b: CodepointSequence) {
	return a.length === b.length && a.every((cp, i) => cp === b[i]);
}

/**
 * File-name identifier: `emoji_u` + lowercase hex code points joined by `_`, e.g. `emoji_u1f6b4_1f3fb`.
 * Presentation selectors are left out, so `263A FE0F` and `263A` share `emoji_u263a`.
 */
export function assetId(seq: CodepointSequence) {
	return 'emoji_u' + seq.filter(cp => cp !== VS16).map(cp => cp.toString(16).padStart(4, '0')).join('_');
}

export function formatSequence(seq: CodepointSequence) {
	return seq.map(cp => 'U+' + cp.toString(16).toUpperCase().padStart(4, '0')).join(' ');
}
