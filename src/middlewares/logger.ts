import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { requestLogger } from '../utils/logger';

export const httpLogger = pinoHttp({
  logger: requestLogger,
  genReqId: (req, res) => {
    const incoming = req.headers['x-request-id'];
    const id = typeof incoming === 'string' && incoming ? incoming : uuidv4();
    res.setHeader('X-Request-Id', id);
    return id;
  },
  // polling would otherwise drown everything else at info level
  customLogLevel: (req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return req.method === 'GET' ? 'debug' : 'info';
  },
  serializers: {
    req(req) {
      return {
        id: req.id,
        method: req.method,
        url: req.url,
        headers: {
          // omit sensitive headers
          'user-agent': req.headers['user-agent'],
          'content-type': req.headers['content-type'],
        },
      };
    },
  },
});
