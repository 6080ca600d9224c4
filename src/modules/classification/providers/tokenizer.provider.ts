import { getEncoding, type Tiktoken } from 'js-tiktoken'
import { ClassifierError } from '../errors/classifier.error'

export interface TokenizerPort {
  initialize(): Promise<void>
  /** No special tokens are added. */
  encode(text: string): number[]
  /** Special tokens are dropped. */
  decode(tokens: number[]): string
  release(): Promise<void>
}

const END_OF_TEXT = '<|endoftext|>'

// Byte-level BPE with the gpt2 merges, the vocabulary family BART was trained with.
export class BpeTokenizer implements TokenizerPort {
  private encoding: Tiktoken | null = null
  private specialIds = new Set<number>()

  async initialize() {
    if (this.encoding) return
    const encoding = getEncoding('gpt2')
    this.specialIds = new Set(encoding.encode(END_OF_TEXT, 'all'))
    this.encoding = encoding
  }

  encode(text: string): number[] {
    // Special-token text in the document is encoded as ordinary text.
    return this.requireEncoding().encode(text, [], [])
  }

  decode(tokens: number[]): string {
    const plain = tokens.filter((t) => !this.specialIds.has(t))
    return this.requireEncoding().decode(plain)
  }

  async release() {
    this.encoding = null
    this.specialIds = new Set()
  }

  private requireEncoding(): Tiktoken {
    if (!this.encoding) throw new ClassifierError('UNAVAILABLE', 'tokenizer not initialized')
    return this.encoding
  }
}
