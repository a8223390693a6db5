import pino from 'pino'
import nock from 'nock'
import { setLogger } from './packages/inference-server/src/utils/logger'

// Tests that assert on log lines install their own logger.
setLogger(pino({ level: 'silent' }))

// Nothing leaves the process.
nock.disableNetConnect()
nock.enableNetConnect(/(127\.0\.0\.1|localhost)/)
