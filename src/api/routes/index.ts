import { Router } from 'express'
import { createHealthCheck } from '../controllers/health.controller'

import { ClassificationController } from '../../modules/classification/controllers/classification.controller'
import { DocumentController } from '../../modules/document/controllers/document.controller'

import { container } from '../../container'

const router = Router()

const health = createHealthCheck(container.classifiers)
const classificationController = new ClassificationController(container.classifiers)
const documentController = new DocumentController(() => container.documents)

router.get('/health', (req, res) => health(req, res))

// -------------------------
// Classification
// -------------------------
router.get('/models', (req, res) => classificationController.models(req, res))
router.post('/classify', (req, res) => classificationController.classify(req, res))

// -------------------------
// Documents
// -------------------------
router.post('/documents', (req, res) => documentController.create(req, res))
router.get('/documents', (req, res) => documentController.list(req, res))
router.get('/documents/:id', (req, res) => documentController.getById(req, res))
router.delete('/documents/:id', (req, res) => documentController.delete(req, res))
router.post('/documents/:id/classify', (req, res) => documentController.classify(req, res))

export default router
