import { beforeEach, describe, expect, it } from 'vitest'
import { ClassifierRegistryService } from '../src/modules/classification/services/application/classifier-registry.service'
import { DocumentClassifierService } from '../src/modules/classification/services/application/document-classifier.service'
import { DocumentController } from '../src/modules/document/controllers/document.controller'
import { DocumentService } from '../src/modules/document/services/document.service'
import { FakeReply, FakeZeroShot, InMemoryDocumentStore, WordTokenizer, output, scoresFor } from './helpers/fakes'

describe('DocumentController', () => {
  let provider: FakeZeroShot
  let service: DocumentService
  let controller: DocumentController

  beforeEach(() => {
    provider = new FakeZeroShot((_text, categories) => output(scoresFor(categories, 'Academic Paper')))
    const registry = new ClassifierRegistryService(
      (model) => new DocumentClassifierService(model, provider, new WordTokenizer()),
      'bart-large-mnli'
    )
    service = new DocumentService(new InMemoryDocumentStore(), registry)
    controller = new DocumentController(() => service)
  })

  async function upload(body: Record<string, unknown>) {
    const res = new FakeReply()
    await controller.create({ body }, res)
    return res
  }

  it('answers 201 with the upload response', async () => {
    const res = await upload({ filename: 'paper.txt', text: 'we propose a method' })

    expect(res.statusCode).toBe(201)
    expect(res.body).toEqual({
      message: 'Document uploaded successfully',
      document_id: 1,
      filename: 'paper.txt',
      content_preview: 'we propose a method',
      classification: {
        predicted_category: 'Academic Paper',
        confidence_score: 0.9,
        auto_classified: true,
      },
    })
  })

  it('answers 400 for an upload without filename', async () => {
    const res = await upload({ text: 'x' })

    expect(res.statusCode).toBe(400)
    expect(res.body).toEqual({ error: 'VALIDATION_ERROR: filename is required' })
  })

  it.each([{ id: 'abc' }, { id: '0' }, {}])('answers 400 for id params %j', async (params) => {
    const res = new FakeReply()

    await controller.getById({ params }, res)

    expect(res.statusCode).toBe(400)
    expect(res.body).toEqual({ error: 'VALIDATION_ERROR: Invalid id' })
  })

  it('answers 404 for a missing document', async () => {
    const get = new FakeReply()
    const del = new FakeReply()
    const classify = new FakeReply()

    await controller.getById({ params: { id: '9' } }, get)
    await controller.delete({ params: { id: '9' } }, del)
    await controller.classify({ params: { id: '9' } }, classify)

    for (const res of [get, del, classify]) {
      expect(res.statusCode).toBe(404)
      expect(res.body).toEqual({ error: 'NOT_FOUND: Document not found' })
    }
  })

  it('lists documents and rejects bad paging', async () => {
    await upload({ filename: 'a.txt', text: 'a', autoClassify: false })
    const ok = new FakeReply()
    const badSkip = new FakeReply()
    const repeated = new FakeReply()

    await controller.list({ query: {} }, ok)
    await controller.list({ query: { skip: 'x' } }, badSkip)
    await controller.list({ query: { limit: ['1', '2'] } }, repeated)

    expect(ok.statusCode).toBe(200)
    expect(Array.isArray(ok.body) && ok.body.length).toBe(1)
    expect(badSkip.statusCode).toBe(400)
    expect(badSkip.body).toEqual({ error: 'VALIDATION_ERROR: Invalid skip' })
    expect(repeated.statusCode).toBe(400)
    expect(repeated.body).toEqual({ error: 'VALIDATION_ERROR: Invalid limit' })
  })

  it('deletes a document', async () => {
    await upload({ filename: 'a.txt', text: 'a', autoClassify: false })
    const res = new FakeReply()

    await controller.delete({ params: { id: '1' } }, res)

    expect(res.statusCode).toBe(200)
    expect(res.body).toEqual({ message: 'Document a.txt deleted successfully' })
  })

  describe('classify', () => {
    it('answers 200 with the stored classification', async () => {
      await upload({ filename: 'a.txt', text: 'a b c', autoClassify: false })
      const res = new FakeReply()

      await controller.classify({ params: { id: '1' } }, res)

      expect(res.statusCode).toBe(200)
      expect(res.body).toMatchObject({
        message: 'Document classified successfully',
        document_id: 1,
        classification_result: { predictedCategory: 'Academic Paper' },
      })
    })

    it('answers 400 for a document without text', async () => {
      await upload({ filename: 'empty.txt' })
      const res = new FakeReply()

      await controller.classify({ params: { id: '1' } }, res)

      expect(res.statusCode).toBe(400)
      expect(res.body).toEqual({ error: 'VALIDATION_ERROR: Document has no text content to classify' })
    })

    it('answers 400 for a non-string model', async () => {
      const res = new FakeReply()

      await controller.classify({ params: { id: '1' }, body: { model: 7 } }, res)

      expect(res.statusCode).toBe(400)
      expect(res.body).toEqual({ error: 'VALIDATION_ERROR: model must be a string' })
    })

    it('answers 503 when the classifier cannot be loaded', async () => {
      await upload({ filename: 'a.txt', text: 'a', autoClassify: false })
      provider.failInit = new Error('HF_API_TOKEN is missing')
      const res = new FakeReply()

      await controller.classify({ params: { id: '1' } }, res)

      expect(res.statusCode).toBe(503)
      expect(res.body).toEqual({
        error: 'UNAVAILABLE: Classification failed: Classifier unavailable: HF_API_TOKEN is missing',
      })
    })
  })

  it('resolves the service per request and maps unexpected errors to 500', async () => {
    let resolved = 0
    const broken = new DocumentController(() => {
      resolved++
      throw new Error('CONFIG_ERROR: Database environment variables are missing!')
    })
    expect(resolved).toBe(0)

    const res = new FakeReply()
    await broken.list({ query: {} }, res)

    expect(resolved).toBe(1)
    expect(res.statusCode).toBe(500)
    expect(res.body).toEqual({ error: 'INTERNAL_ERROR' })
  })
})
