export {FontError, MalformedFont, UnsupportedPostFormat, StrikeNotFound, type Stage} from './errors';
export {parseContainer, requireTable, type FontTable, type TableDirectory} from './sfnt';
export {parsePost, GlyphNameIndex} from './post';
export {parseSbix, readStrikes, StrikeExtractor, BitmapRef, type BitmapStrike, type StrikeInfo, type StrikeGlyph} from './sbix';
export {EmojiFont, type GlyphBitmap, type OpenOptions} from './font';
export {assetId, formatSequence, type CodepointSequence} from './sequence';
export {MemoryDatabase, emojibaseDatabase, type Emoji, type EmojiDatabase} from './database';
export {SequenceResolver, CompositePattern, TokenPattern, PATTERNS, candidatesFor, type NamePattern} from './resolver';
export {ModifierBases, ModifierSequenceEnumerator, type SynthesisResult} from './modifiers';
export {DirectorySink, MemorySink, type AssetSink} from './sink';
export {Extractor, type ExtractReport, type ExtractorOptions} from './extract';
export {parseOptions, OptionsSchema, type Options} from './config';
export {Logger, type LogLevel} from './logger';
export {loadFont, loadModifierBases, extractFile} from './load';
