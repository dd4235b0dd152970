import {z} from 'zod';
import compact from 'emojibase-data/en/compact.json';
import {CodepointSequence, VS16, fromText, toText} from './sequence';

export interface Emoji {
	sequence:	CodepointSequence;
	label:		string;
}

/** Canonical emoji data the resolver checks its candidates against. */
export interface EmojiDatabase {
	findBySequence(seq: CodepointSequence): Emoji | undefined;
	//base emoji, without their skin tone variants
	all(): Iterable<Emoji>;
}

//-----------------------------------------------------------------------------
//	In-memory database
//-----------------------------------------------------------------------------

export class MemoryDatabase implements EmojiDatabase {
	private readonly emojis:	readonly Emoji[];
	private readonly index		= new Map<string, Emoji>();

	/**
	 * @param emojis enumerated by {@link all} and found by sequence
	 * @param variants found by sequence only (skin tone variants)
	 */
	constructor(emojis: Iterable<Emoji>, variants: Iterable<Emoji> = []) {
		this.emojis = [...emojis];
		const every = [...this.emojis, ...variants];
		for (const e of every)
			this.add(e.sequence, e);

		//an emoji is also found without its presentation selectors, unless another entry has that exact sequence
		for (const e of every) {
			const bare = e.sequence.filter(cp => cp !== VS16);
			if (bare.length !== e.sequence.length)
				this.add(bare, e);
		}
	}

	private add(seq: CodepointSequence, emoji: Emoji) {
		const key = toText(seq);
		if (!this.index.has(key))
			this.index.set(key, emoji);
	}

	findBySequence(seq: CodepointSequence) {
		return this.index.get(toText(seq));
	}

	all() {
		return this.emojis;
	}
}

//-----------------------------------------------------------------------------
//	emojibase
//-----------------------------------------------------------------------------

const CompactSkin = z.object({
	label:		z.string().optional(),
	hexcode:	z.string(),
	unicode:	z.string(),
});

const CompactEmoji = CompactSkin.extend({
	skins:		z.array(CompactSkin).optional(),
});

function toEmoji(entry: z.infer<typeof CompactSkin>): Emoji {
	return {sequence: fromText(entry.unicode), label: entry.label ?? entry.hexcode};
}

/** Database over the English compact dataset of `emojibase-data`. */
export function emojibaseDatabase(): MemoryDatabase {
	const entries = z.array(CompactEmoji).parse(compact);
	return new MemoryDatabase(
		entries.map(toEmoji),
		entries.flatMap(e => (e.skins ?? []).map(toEmoji))
	);
}
