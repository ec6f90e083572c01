import pino from 'pino'

// Code under test logs through the global `log`, the server installs the real one
globalThis.log = pino({ level: 'silent' })
