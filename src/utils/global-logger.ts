import pino, { Level } from 'pino'
import pretty from 'pino-pretty'
import { Writable } from 'stream'
import { Logtail } from '@logtail/node'

const { BETTERSTACK_SOURCE_TOKEN, BETTERSTACK_ENDPOINT, CONSOLE_LOG_LEVEL } = process.env

const LEVELS = Object.keys(pino.levels.values)
const isLevel = (value: string | undefined): value is Level =>
   value !== undefined && LEVELS.includes(value)

const streams: pino.StreamEntry[] = []

// Stream 1 – always pretty-printed output to local stdout (TTY or not)
streams.push({
   level: isLevel(CONSOLE_LOG_LEVEL) ? CONSOLE_LOG_LEVEL : 'info',
   stream: pretty({
      colorize: true,
      translateTime: 'SYS:d mmm HH:MM:ss.l',
      ignore: 'pid,hostname',
   }),
})

// Stream 2: Better Stack, only when the deployment provides a source token
if (BETTERSTACK_SOURCE_TOKEN && BETTERSTACK_ENDPOINT) {
   const logtail = new Logtail(
      BETTERSTACK_SOURCE_TOKEN,
      { endpoint: BETTERSTACK_ENDPOINT }
   )

   const betterStackStream = new Writable({
      objectMode: true,
      write(chunk, _enc, cb) {
         const { level, time, pid, hostname, msg, ...context } = JSON.parse(chunk.toString())
         const label = pino.levels.labels[level] || 'info'
         logtail.log(msg, label, context).then(() => cb(), cb)
      },
   })

   process.on('beforeExit', async () => {
      await logtail.flush()
   })

   streams.push({ level: 'debug', stream: betterStackStream })
}


const logger = pino({ level: 'trace' }, pino.multistream(streams))
globalThis.log = logger


export default logger
