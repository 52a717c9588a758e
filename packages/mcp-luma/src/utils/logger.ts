import pino from 'pino';

const logLevel = process.env.LOG_LEVEL || process.env.MCP_LUMA_LOG_LEVEL || 'info';

// stdout belongs to the stdio transport
export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);
