import { describe, it, expect } from 'vitest'
import { MalformedFont } from '../src/errors'
import { EmojiFont } from '../src/font'
import { fontOffsets, parseContainer } from '../src/sfnt'
import { Reader } from '../src/reader'
import { buildFont, png, type TestGlyph } from './build-font'

const glyphs: TestGlyph[] = [
  { name: '.notdef' },
  { name: 'space' },
  { name: 'u1F466', image: png(1, 2, 3) },
  { name: 'u1F6B4.1', image: png(4, 5) },
]

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected an error')
}

describe('container - table directory', () => {
  it('reads the directory of a plain sfnt font', () => {
    const tables = parseContainer(buildFont({ glyphs }))

    expect([...tables.keys()]).toEqual(['post', 'sbix'])
    // 12 byte header + 2 records; post is 32 + 2 + 4 * 2 + 7 + 9 bytes
    expect(tables.get('post')).toMatchObject({ tag: 'post', offset: 44, length: 58 })
    expect(tables.get('sbix')).toMatchObject({ tag: 'sbix', offset: 104 })
  })

  it('reads the first font of a collection', () => {
    const data = buildFont({ glyphs, collection: true })

    expect(fontOffsets(new Reader(data, 'container'))).toEqual([16])
    expect(parseContainer(data).get('post')).toMatchObject({ offset: 60, length: 58 })
  })

  it('treats a file without the collection tag as one font', () => {
    const data = buildFont({ glyphs })

    expect(fontOffsets(new Reader(data, 'container'))).toEqual([0])
  })
})

describe('container - malformed input', () => {
  it('rejects an unknown sfnt version at the font start', () => {
    const error = thrown(() => parseContainer(buildFont({ glyphs, collection: true, sfntVersion: 0x12345678 })))

    expect(error).toBeInstanceOf(MalformedFont)
    expect(error).toMatchObject({ stage: 'container', offset: 16 })
    expect(error).toHaveProperty('message', 'container: unrecognised sfnt version 0x12345678 at offset 0x00000010')
  })

  it('rejects a truncated collection header', () => {
    const data = buildFont({ glyphs, collection: true }).subarray(0, 8)

    expect(thrown(() => parseContainer(data))).toMatchObject({ stage: 'container', offset: 0 })
  })

  it('rejects a truncated table directory', () => {
    const error = thrown(() => parseContainer(buildFont({ glyphs }).subarray(0, 20)))

    expect(error).toBeInstanceOf(MalformedFont)
    expect(error).toHaveProperty('message', 'container: truncated table record 0 at offset 0x0000000c')
  })

  it('rejects tables that run past the end of the file', () => {
    const error = thrown(() => parseContainer(buildFont({ glyphs }).subarray(0, 100)))

    expect(error).toBeInstanceOf(MalformedFont)
    expect(error).toMatchObject({ stage: 'container', offset: 12 })
  })

  it('rejects an empty file', () => {
    expect(() => parseContainer(new Uint8Array(0))).toThrow(MalformedFont)
  })

  it('rejects a font index outside the collection', () => {
    const data = buildFont({ glyphs, collection: true })

    expect(() => parseContainer(data, 1)).toThrow('container: font index 1 not in collection of 1')
  })

  it('requires the post and sbix tables', () => {
    expect(() => EmojiFont.open(buildFont({ glyphs, omit: ['sbix'] }), { size: 160 }))
      .toThrow("sbix: missing required 'sbix' table")
    expect(() => EmojiFont.open(buildFont({ glyphs, omit: ['post'] }), { size: 160 }))
      .toThrow("post: missing required 'post' table")
  })
})
