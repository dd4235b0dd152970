import fs from 'fs-extra';
import * as path from 'path';
import type {StrikeGlyph} from './sbix';

export type Image = Pick<StrikeGlyph, 'graphicType' | 'ref'>;

/**
 * Where extracted images go.
 * `write` never replaces an asset that is already there and reports whether it wrote anything.
 */
export interface AssetSink {
	has(id: string): Promise<boolean>;
	write(id: string, image: Image): Promise<boolean>;
	//unresolved glyphs, kept under their font-internal name
	writeRaw(name: string, image: Image): Promise<boolean>;
}

const EXTENSIONS: Record<string, string> = {
	'png ':	'png',
	'jpg ':	'jpg',
	'tiff':	'tiff',
};

export function extensionFor(graphicType: string) {
	return EXTENSIONS[graphicType] ?? 'bin';
}

const KNOWN_EXTENSIONS = [...Object.values(EXTENSIONS), 'bin'];

//-----------------------------------------------------------------------------
//	MemorySink
//-----------------------------------------------------------------------------

export class MemorySink implements AssetSink {
	readonly assets	= new Map<string, Uint8Array>();
	readonly raw	= new Map<string, Uint8Array>();

	async has(id: string) {
		return this.assets.has(id);
	}

	async write(id: string, image: Image) {
		if (this.assets.has(id))
			return false;
		this.assets.set(id, image.ref.read());
		return true;
	}

	async writeRaw(name: string, image: Image) {
		if (this.raw.has(name))
			return false;
		this.raw.set(name, image.ref.read());
		return true;
	}
}

//-----------------------------------------------------------------------------
//	DirectorySink
//-----------------------------------------------------------------------------

//	<root>/unicode/emoji_u1f466.png
//	<root>/raw/u1F466.png
export class DirectorySink implements AssetSink {
	constructor(readonly root: string) {}

	unicodePath(id: string, ext: string) {
		return path.join(this.root, 'unicode', `${id}.${ext}`);
	}

	rawPath(name: string, ext: string) {
		return path.join(this.root, 'raw', `${name.replace(/[/\\]/g, '_')}.${ext}`);
	}

	//removes the output of a previous run; anything else under root is left alone
	async clean() {
		await fs.remove(path.join(this.root, 'unicode'));
		await fs.remove(path.join(this.root, 'raw'));
	}

	async has(id: string) {
		for (const ext of KNOWN_EXTENSIONS) {
			if (await fs.pathExists(this.unicodePath(id, ext)))
				return true;
		}
		return false;
	}

	private async put(file: string, image: Image) {
		if (await fs.pathExists(file))
			return false;
		await fs.outputFile(file, image.ref.read());
		return true;
	}

	async write(id: string, image: Image) {
		if (await this.has(id))
			return false;
		return this.put(this.unicodePath(id, extensionFor(image.graphicType)), image);
	}

	async writeRaw(name: string, image: Image) {
		return this.put(this.rawPath(name, extensionFor(image.graphicType)), image);
	}
}
