import {Emoji, EmojiDatabase} from './database';
import {CodepointSequence, FEMALE_SIGN, HEART, KISS_MARK, MALE_SIGN, SKIN_TONES, VS16, ZWJ, fromText, sameSequence} from './sequence';

const zwj	= String.fromCodePoint(ZWJ);
const vs16	= String.fromCodePoint(VS16);

//-----------------------------------------------------------------------------
//	Glyph name patterns
//-----------------------------------------------------------------------------

/** Turns a glyph name into candidate texts, or undefined when the name is not in this pattern's form. */
export interface NamePattern {
	readonly kind: 'composite' | 'token';
	match(name: string): string[] | undefined;
}

const FAMILY	= 0x1F46A;
const COUPLE	= 0x1F491;
const KISS		= 0x1F48F;

const PEOPLE: Record<string, number> = {
	B: 0x1F466,	//boy
	G: 0x1F467,	//girl
	M: 0x1F468,	//man
	W: 0x1F469,	//woman
};

interface Composite {
	canonical:	string;				//members drawn by the legacy single code point
	joiner:		readonly number[];
}

const COMPOSITES = new Map<number, Composite>([
	[FAMILY,	{canonical: 'MWB',	joiner: [ZWJ]}],
	[COUPLE,	{canonical: 'WM',	joiner: [ZWJ, HEART, VS16, ZWJ]}],
	[KISS,		{canonical: 'WM',	joiner: [ZWJ, HEART, VS16, ZWJ, KISS_MARK, ZWJ]}],
]);

const COMPOSITE_NAME = /^u(1F46A|1F491|1F48F)\.([BGMW]+)$/;

//u1F46A.MWG: family of man, woman and girl
export const CompositePattern: NamePattern = {
	kind: 'composite',
	match(name) {
		const m = COMPOSITE_NAME.exec(name);
		if (!m)
			return;

		const base		= parseInt(m[1], 16);
		const members	= m[2];
		const composite	= COMPOSITES.get(base);
		if (!composite)
			return;
		if (members === composite.canonical)
			return [String.fromCodePoint(base)];

		const joiner = String.fromCodePoint(...composite.joiner);
		return [[...members].map(c => String.fromCodePoint(PEOPLE[c])).join(joiner)];
	}
};

const TOKEN		= /(^|_)u([0-9A-F]+)/g;
const NEUTRAL	= /\.0\b/;
const TONE		= /\.([1-5])/;
const GENDER	= /\.([MW])$/;

function tokenText(match: string, sep: string, hex: string) {
	const cp = parseInt(hex, 16);
	if (cp > 0x10FFFF)
		return match;
	return (sep ? zwj : '') + String.fromCodePoint(cp);
}

//u1F6B4.1, u1F46E.2.W, u1F441_u1F5E8
export const TokenPattern: NamePattern = {
	kind: 'token',
	match(name) {
		const raw = name
			.replace(TOKEN, tokenText)
			.replace(NEUTRAL, '')
			.replace(TONE, (_, digit: string) => String.fromCodePoint(SKIN_TONES[Number(digit) - 1]))
			.replace(GENDER, (_, sign: string) => vs16 + zwj + String.fromCodePoint(sign === 'M' ? MALE_SIGN : FEMALE_SIGN));

		//fonts and Unicode data disagree on where selectors and joiners are optional
		const candidates = [raw];
		if (raw.includes(vs16))
			candidates.push(raw.replace(vs16, ''));
		if (raw.includes(zwj))
			candidates.push(raw.split(zwj).join(''));
		for (const c of [...candidates])
			candidates.push(c + vs16);

		return [...new Set(candidates)];
	}
};

export const PATTERNS: readonly NamePattern[] = [CompositePattern, TokenPattern];

//-----------------------------------------------------------------------------
//	Resolver
//-----------------------------------------------------------------------------

export function candidatesFor(name: string, patterns: readonly NamePattern[] = PATTERNS): CodepointSequence[] {
	for (const pattern of patterns) {
		const texts = pattern.match(name);
		if (texts)
			return texts.map(fromText);
	}
	return [];
}

const FEMALE_SUFFIX = [VS16, ZWJ, FEMALE_SIGN];

/** True if `sequence`, or its explicitly female form, is among the candidates. */
export function includesSequence(candidates: readonly CodepointSequence[], sequence: CodepointSequence) {
	const female = [...sequence, ...FEMALE_SUFFIX];
	return candidates.some(c => sameSequence(c, sequence) || sameSequence(c, female));
}

export class SequenceResolver {
	constructor(readonly database: EmojiDatabase, readonly patterns: readonly NamePattern[] = PATTERNS) {}

	candidatesFor(name: string) {
		return candidatesFor(name, this.patterns);
	}

	//unique name mode: the first candidate the database knows, labelled by its entry
	resolve(name: string): Emoji | undefined {
		for (const c of this.candidatesFor(name)) {
			const emoji = this.database.findBySequence(c);
			if (emoji)
				return {sequence: c, label: emoji.label};
		}
	}

	//find any match mode
	contains(name: string, sequence: CodepointSequence) {
		return includesSequence(this.candidatesFor(name), sequence);
	}
}
