export { createRng, randomInt, type Rng } from './rng'
export { generateRecords, type GenerateOptions } from './generator'
