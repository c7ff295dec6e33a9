import pino from 'pino'

// stdout queda libre para prompts y preview; los logs van a stderr
export const logger = pino(
  {
    name: 'gitlab-roulette',
    level: process.env.LOG_LEVEL || 'warn',
  },
  pino.destination(2)
)
