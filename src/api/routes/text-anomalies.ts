import { Router, type Request, type Response } from 'express';
import type { PipelineResult, TextAnomalyPipeline } from '../../services/pipeline/index.js';

export type TextAnomalyResponseBody =
  | { message: string }
  | { inputUrl: string; reportWithAnomalies: string };

export interface HttpReply {
  status: number;
  body: TextAnomalyResponseBody;
}

export function toHttpReply(result: PipelineResult): HttpReply {
  switch (result.kind) {
    case 'failure':
      return { status: 400, body: { message: result.error.message } };
    case 'no_anomaly':
      return { status: 204, body: { message: result.message } };
    case 'report_ready':
      return {
        status: 200,
        body: { inputUrl: result.inputUrl, reportWithAnomalies: result.accessLink.url },
      };
  }
}

export function createTextAnomalyRouter(pipeline: TextAnomalyPipeline): Router {
  const router = Router();

  router.post('/text-anomalies', async (req: Request, res: Response) => {
    const result = await pipeline.run(req.body);
    const reply = toHttpReply(result);
    res.status(reply.status).json(reply.body);
  });

  return router;
}
