export { BYTE_KEYS, type CountEntry, CountingMap, fnv1a, type KeyCodec } from './counting-map.ts'
export { Vocabulary, type VocabularyEntry } from './vocabulary.ts'
