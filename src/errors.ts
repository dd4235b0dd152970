//-----------------------------------------------------------------------------
//	Errors
//-----------------------------------------------------------------------------

export type Stage = 'container' | 'post' | 'sbix';

function hex(offset: number) {
	return '0x' + offset.toString(16).padStart(8, '0');
}

export class FontError extends Error {
	constructor(readonly stage: Stage, readonly detail: string, readonly offset?: number) {
		super(`${stage}: ${detail}${offset === undefined ? '' : ` at offset ${hex(offset)}`}`);
		this.name = new.target.name;
	}
}

//	bad signature, truncated directory or record, out-of-bounds offsets
export class MalformedFont extends FontError {}

export class UnsupportedPostFormat extends FontError {
	constructor(readonly version: string, offset?: number) {
		super('post', `unsupported post table version ${version}`, offset);
	}
}

export class StrikeNotFound extends FontError {
	constructor(readonly ppem: number, readonly available: readonly number[], offset?: number) {
		super('sbix', `no strike at ${ppem} ppem (available: ${available.length ? available.join(', ') : 'none'})`, offset);
	}
}
