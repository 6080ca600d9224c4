import cors from 'cors'
import express from 'express'
import routes from './api/routes'
import { container } from './container'

const app = express()

app.use(
  cors({
    origin: container.config.corsOrigins,
    credentials: true,
  })
)

app.use(express.json({ limit: '10mb' }))

app.use('/api', routes)

export default app
