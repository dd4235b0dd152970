import { describe, it, expect } from 'vitest'
import { MalformedFont, StrikeNotFound } from '../src/errors'
import { EmojiFont } from '../src/font'
import { Reader } from '../src/reader'
import { parseSbix, readStrikes } from '../src/sbix'
import { ByteWriter, buildFont, buildSbix, png, type TestGlyph } from './build-font'

const glyphs: TestGlyph[] = [
  { name: '.notdef' },
  { name: 'u1F466', image: png(1, 2, 3), x: -2, y: 5 },
  { name: 'space' },
  { name: 'u1F467', image: [0, 1], graphicType: 'dupe' },
  { name: 'u1F468', image: png(9), graphicType: 'jpg ' },
]

function sbix(bytes: Uint8Array) {
  return new Reader(bytes, 'sbix')
}

describe('sbix - strikes', () => {
  it('lists every strike', () => {
    // 8 byte header + 2 offsets; each strike is 4 + 6 * 4 bytes of offsets + 46 bytes of records
    expect(readStrikes(sbix(buildSbix(glyphs, [32, 136])))).toEqual([
      { ppem: 32, resolution: 72, offset: 16 },
      { ppem: 136, resolution: 72, offset: 90 },
    ])
  })

  it('selects the strike matching the requested size', () => {
    const extractor = parseSbix(sbix(buildSbix(glyphs, [32, 136])), 136, glyphs.length)

    expect(extractor.strike.ppem).toBe(136)
    expect(extractor.strike.offset).toBe(90)
    expect(extractor.strike.glyphDataOffsets).toEqual([28, 28, 47, 47, 57, 74])
    expect(extractor.numGlyphs).toBe(5)
  })

  it('never reads strikes after the one selected', () => {
    const bytes = buildSbix(glyphs, [136, 32])
    bytes.set([0xff, 0xff, 0xff, 0xff], 12)

    expect(parseSbix(sbix(bytes), 136, glyphs.length).strike.ppem).toBe(136)
    expect(() => parseSbix(sbix(bytes), 32, glyphs.length)).toThrow(MalformedFont)
  })

  it('reports a missing strike size', () => {
    const parse = () => parseSbix(sbix(buildSbix(glyphs, [32, 136])), 160, glyphs.length)

    expect(parse).toThrow(StrikeNotFound)
    expect(parse).toThrow('sbix: no strike at 160 ppem (available: 32, 136) at offset 0x00000000')
  })
})

describe('sbix - glyph bitmaps', () => {
  const bytes = buildSbix(glyphs, [32, 136])
  const extractor = parseSbix(sbix(bytes), 136, glyphs.length)

  it('decodes origin and graphic type', () => {
    const bitmap = extractor.bitmapFor(1)

    expect(bitmap).toMatchObject({ glyphId: 1, origin: { x: -2, y: 5 }, graphicType: 'png ' })
    expect(bitmap?.ref.start).toBe(90 + 28 + 8)
    expect(bitmap?.ref.length).toBe(11)
    expect(bitmap?.ref.read()).toEqual(Uint8Array.from(png(1, 2, 3)))
  })

  it('returns the bytes between consecutive data offsets', () => {
    const offsets = extractor.strike.glyphDataOffsets
    const start = extractor.strike.offset + offsets[1] + 8
    const end = extractor.strike.offset + offsets[2]

    expect(extractor.bitmapFor(1)?.ref.read()).toEqual(bytes.slice(start, end))
  })

  it('skips glyphs without an image', () => {
    expect(extractor.bitmapFor(0)).toBeUndefined()
    expect(extractor.bitmapFor(2)).toBeUndefined()
    expect(extractor.bitmapFor(9)).toBeUndefined()
  })

  it('follows dupe records to the glyph they copy', () => {
    const bitmap = extractor.bitmapFor(3)

    expect(bitmap).toMatchObject({ glyphId: 3, dupeOf: 1, graphicType: 'png ' })
    expect(bitmap?.ref.read()).toEqual(Uint8Array.from(png(1, 2, 3)))
  })

  it('keeps the graphic type of other formats', () => {
    expect(extractor.bitmapFor(4)?.graphicType).toBe('jpg ')
  })

  it('copies image bytes on every read', () => {
    const ref = extractor.bitmapFor(1)?.ref
    const first = ref?.read()
    if (first)
      first[0] = 0

    expect(ref?.read()[0]).toBe(0x89)
  })
})

describe('sbix - malformed strikes', () => {
  function strike(offsets: number[], data: number[]) {
    const w = new ByteWriter().u16(1).u16(0).u32(1).u32(12).u16(160).u16(72)
    for (const offset of offsets)
      w.u32(offset)
    return sbix(w.raw(data).toBytes())
  }

  it('rejects a record shorter than its header', () => {
    const extractor = parseSbix(strike([12, 16], [0, 0, 0, 0]), 160, 1)

    expect(() => extractor.bitmapFor(0)).toThrow(MalformedFont)
    expect(() => extractor.bitmapFor(0)).toThrow('sbix: glyph 0 record of 4 bytes is shorter than its header at offset 0x00000018')
  })

  it('rejects a record running past the table', () => {
    const extractor = parseSbix(strike([12, 100], [0, 0, 0, 0]), 160, 1)

    expect(() => extractor.bitmapFor(0)).toThrow('sbix: truncated glyph 0 data at offset 0x00000018')
  })

  it('rejects a dupe of an empty glyph', () => {
    const extractor = parseSbix(sbix(buildSbix([{ name: '.notdef' }, { name: 'x', image: [0, 0], graphicType: 'dupe' }], [160])), 160, 2)

    expect(() => extractor.bitmapFor(1)).toThrow('sbix: glyph 1 duplicates glyph 0, which has no image at offset 0x00000024')
  })

  it('rejects a truncated offset table', () => {
    expect(() => parseSbix(strike([12], []), 160, 1)).toThrow('sbix: truncated glyph data offsets at offset 0x00000010')
  })
})

describe('sbix - through the font', () => {
  const data = buildFont({ glyphs, strikes: [32, 136], collection: true })

  it('lists glyphs with images in glyph id order', () => {
    const font = EmojiFont.open(data, { size: 136 })

    expect(font.ppem).toBe(136)
    expect([...font.glyphs()].map(g => [g.glyphId, g.name])).toEqual([
      [1, 'u1F466'],
      [3, 'u1F467'],
      [4, 'u1F468'],
    ])
  })

  it('slices images out of the whole file', () => {
    const font = EmojiFont.open(data, { size: 136 })
    const table = font.tables.get('sbix')
    const start = (table?.offset ?? 0) + 90 + 28 + 8

    expect(font.bitmapFor(1)?.ref.read()).toEqual(data.slice(start, start + 11))
    expect(font.bitmapFor(1)?.name).toBe('u1F466')
  })

  it('fails for a size the font does not embed', () => {
    const open = () => EmojiFont.open(data, { size: 160 })

    expect(open).toThrow(StrikeNotFound)
    expect(open).toThrow('sbix: no strike at 160 ppem (available: 32, 136)')
  })
})
