import { readFileSync } from 'node:fs'
import { z } from 'zod'

const wordList = z.array(z.string().min(1))

const vocabularySchema = z.object({
  greetings: wordList,
  complexTriggers: wordList,
  stationCountPhrases: wordList,
  relevant: wordList,
  offTopic: wordList,
  explainTopics: wordList,
  topics: z.object({
    counts: wordList,
    countStations: wordList,
    countRecords: wordList,
    airQuality: wordList,
    climate: wordList,
    location: wordList,
  }),
})

export type Vocabulary = z.infer<typeof vocabularySchema>

// src/chat and dist/chat sit at the same depth
const VOCABULARY_URL = new URL('../../data/chat-vocabulary.json', import.meta.url)

const parsed: unknown = JSON.parse(readFileSync(VOCABULARY_URL, 'utf-8'))

export const vocabulary: Vocabulary = vocabularySchema.parse(parsed)
