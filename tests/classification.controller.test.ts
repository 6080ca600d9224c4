import { beforeEach, describe, expect, it } from 'vitest'
import { ClassificationController } from '../src/modules/classification/controllers/classification.controller'
import { ClassifierRegistryService } from '../src/modules/classification/services/application/classifier-registry.service'
import { DocumentClassifierService } from '../src/modules/classification/services/application/document-classifier.service'
import { FakeReply, FakeZeroShot, WordTokenizer, output, scoresFor } from './helpers/fakes'

describe('ClassificationController', () => {
  let provider: FakeZeroShot
  let controller: ClassificationController

  beforeEach(() => {
    provider = new FakeZeroShot((_text, categories) => output(scoresFor(categories, 'Legal Document')))
    const registry = new ClassifierRegistryService(
      (model) => new DocumentClassifierService(model, provider, new WordTokenizer()),
      'bart-large-mnli'
    )
    controller = new ClassificationController(registry)
  })

  it('lists the model catalog', () => {
    const res = new FakeReply()

    controller.models({}, res)

    expect(res.statusCode).toBe(200)
    expect(Object.keys(Object(res.body))).toEqual(['bart-large-mnli', 'mdeberta-v3-base'])
  })

  it('returns the classification result', async () => {
    const res = new FakeReply()

    await controller.classify({ body: { text: 'the parties agree' } }, res)

    expect(res.statusCode).toBe(200)
    expect(res.body).toMatchObject({
      predictedCategory: 'Legal Document',
      confidenceScore: 0.9,
      aggregationMethod: 'direct',
      modelKey: 'bart-large-mnli',
    })
  })

  it('answers 400 with the sentinel for blank text', async () => {
    const res = new FakeReply()

    await controller.classify({ body: { text: '  ' } }, res)

    expect(res.statusCode).toBe(400)
    expect(res.body).toEqual({
      error: 'Empty text provided',
      code: 'EMPTY_INPUT',
      predictedCategory: 'Other',
      confidenceScore: 0,
    })
    expect(provider.calls).toEqual([])
  })

  it('answers 400 for duplicate categories', async () => {
    const res = new FakeReply()

    await controller.classify({ body: { text: 'x', categories: ['A', 'A'] } }, res)

    expect(res.statusCode).toBe(400)
    expect(res.body).toMatchObject({ code: 'INVALID_CATEGORIES', error: "Duplicate category 'A'" })
  })

  it('answers 503 when the classifier cannot be loaded', async () => {
    provider.failInit = new Error('HF_API_TOKEN is missing')
    const res = new FakeReply()

    await controller.classify({ body: { text: 'the parties agree' } }, res)

    expect(res.statusCode).toBe(503)
    expect(res.body).toEqual({
      error: 'Classifier unavailable: HF_API_TOKEN is missing',
      code: 'UNAVAILABLE',
      predictedCategory: 'Other',
      confidenceScore: 0,
    })
  })

  it('answers 500 when the model call fails', async () => {
    const failing = new FakeZeroShot(() => {
      throw new Error('bad gateway')
    })
    const registry = new ClassifierRegistryService(
      (model) => new DocumentClassifierService(model, failing, new WordTokenizer()),
      'bart-large-mnli'
    )
    const res = new FakeReply()

    await new ClassificationController(registry).classify({ body: { text: 'hello' } }, res)

    expect(res.statusCode).toBe(500)
    expect(res.body).toMatchObject({ code: 'CLASSIFICATION_FAILED', error: 'bad gateway' })
  })

  it.each([
    [{}, 'VALIDATION_ERROR: text must be a string'],
    [{ text: 5 }, 'VALIDATION_ERROR: text must be a string'],
    [{ text: 'x', categories: 'Legal Document' }, 'VALIDATION_ERROR: categories must be an array of strings'],
    [{ text: 'x', model: 42 }, 'VALIDATION_ERROR: model must be a string'],
  ])('answers 400 for body %j', async (body, error) => {
    const res = new FakeReply()

    await controller.classify({ body }, res)

    expect(res.statusCode).toBe(400)
    expect(res.body).toEqual({ error })
  })

  it('answers 400 for an unknown model key', async () => {
    const res = new FakeReply()

    await controller.classify({ body: { text: 'x', model: 'nope' } }, res)

    expect(res.statusCode).toBe(400)
    expect(res.body).toEqual({
      error: "VALIDATION_ERROR: Model 'nope' not supported. Available models: bart-large-mnli, mdeberta-v3-base",
    })
  })
})
