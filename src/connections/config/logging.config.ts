import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

export const logConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  dir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  // File transports are off under test unless asked for explicitly
  toFile: (process.env.LOG_TO_FILE || (nodeEnv === 'test' ? 'false' : 'true')) === 'true',
  silentConsole: nodeEnv === 'test',
  rotation: '10MB',
  retention: '30d',
  compression: true,
};
