import {
  Router,
  Response,
  RequestHandler
} from 'express'
import * as codecService from '../services/codecService'
import { FIELD_NAMES, getFieldConfig, isFieldName } from '../config/fieldConfig'
import { CodecError } from '../utils/errors'
import { createServiceLogger } from '../utils/logger'
import { FieldName, TrailingAbsences } from '../types'

const router = Router()
const logger = createServiceLogger('Codec Routes')

const TRAILING_POLICIES: ReadonlyArray<TrailingAbsences> = ['keep', 'trim']

// Error handler
const handleServiceError = (
  err: unknown,
  res: Response,
  defaultMessage: string
) => {
  if (err instanceof CodecError) {
    res.status(err.statusCode).json({
      error: err.message,
      type: err.name,
      field: err.field ?? null,
      position: err.position ?? null
    })
    return
  }
  logger.error('Error handled in route:', { error: err })
  res.status(500).json({ error: defaultMessage })
}

// Resolves :field or answers 404 with the known field names
const resolveField = (
  name: string | undefined,
  res: Response
): FieldName | undefined => {
  if (name && isFieldName(name)) return name
  res.status(404).json({
    error: `Unknown field "${name ?? ''}". Must be one of: ${FIELD_NAMES.join(', ')}`
  })
  return undefined
}

// GET /api/v1/fields
const listFieldsHandler: RequestHandler = (_req, res) => {
  res.json(FIELD_NAMES.map(getFieldConfig))
}

router.get('/fields', listFieldsHandler)

// GET /api/v1/fields/bearings/parse?value=;10,20
const parseFieldHandler: RequestHandler = (req, res) => {
  const field = resolveField(req.params.field, res)
  if (!field) return

  const raw = req.query.value
  if (raw !== undefined && typeof raw !== 'string') {
    res.status(400).json({ error: 'The value query parameter must be given once.' })
    return
  }

  try {
    const values = codecService.parseField(field, raw)
    res.json({ field, values })
  } catch (err) {
    handleServiceError(err, res, 'Failed to parse value.')
  }
}

router.get('/fields/:field/parse', parseFieldHandler)

// POST /api/v1/fields/bearings/format  { "values": [null, [10, 20]], "trailing": "keep" }
const formatFieldHandler: RequestHandler = (req, res) => {
  const field = resolveField(req.params.field, res)
  if (!field) return

  const body: unknown = req.body
  if (typeof body !== 'object' || body === null || !('values' in body)) {
    res.status(400).json({ error: 'Request body must be an object with a "values" property.' })
    return
  }

  let trailing: TrailingAbsences | undefined = undefined
  if ('trailing' in body && body.trailing !== undefined) {
    const requestedPolicy: unknown = body.trailing
    const requested = TRAILING_POLICIES.find((policy) => policy === requestedPolicy)
    if (!requested) {
      res.status(400).json({
        error: `Invalid trailing policy. Must be one of: ${TRAILING_POLICIES.join(', ')}`
      })
      return
    }
    trailing = requested
  }

  try {
    const value = codecService.formatField(field, body.values, trailing)
    res.json({ field, value })
  } catch (err) {
    handleServiceError(err, res, 'Failed to format values.')
  }
}

router.post('/fields/:field/format', formatFieldHandler)

export default router
