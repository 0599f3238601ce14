import pino from 'pino';

const logger = pino({
  name: 'notes-sync',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
