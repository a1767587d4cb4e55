import { Request, Response } from 'express';
import { z } from 'zod';
import type { DocsAssistant } from '../services/rag/docsAssistant';
import { normalizeCdpId } from '../services/rag/pageStore';
import type { DocumentSource } from '../services/rag/types';

const cdpListSchema = z.array(z.string().trim().min(1).max(64)).max(20).optional();

const askSchema = z.object({
  message: z.string().trim().min(1).max(100_000),
  cdps: cdpListSchema,
  topK: z.coerce.number().int().positive().max(20).optional(),
});

const compareSchema = z.object({
  feature: z.string().trim().min(1).max(2000),
  cdps: cdpListSchema,
});

function unknownCdps(assistant: DocsAssistant, cdps: readonly string[] | undefined): string[] {
  const status = assistant.status();
  if (!cdps?.length || !status.ready) {
    return [];
  }
  return [...new Set(cdps.map(normalizeCdpId))].filter((cdpId) => !(cdpId in status.corpora));
}

function rejectUnknownCdps(assistant: DocsAssistant, cdps: readonly string[] | undefined, res: Response): boolean {
  const unknown = unknownCdps(assistant, cdps);
  if (unknown.length === 0) {
    return false;
  }
  res.status(400).json({ message: `Unknown CDP ids: ${unknown.join(', ')}` });
  return true;
}

export interface AssistantController {
  ask(req: Request, res: Response): void;
  askDetailed(req: Request, res: Response): void;
  compare(req: Request, res: Response): void;
  status(req: Request, res: Response): void;
  reindex(req: Request, res: Response): Promise<void>;
}

export function createAssistantController(
  assistant: DocsAssistant,
  source?: DocumentSource
): AssistantController {
  return {
    ask(req, res) {
      const parsed = askSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
        return;
      }

      if (rejectUnknownCdps(assistant, parsed.data.cdps, res)) {
        return;
      }

      const answer = assistant.answerQuery(parsed.data.message, {
        cdps: parsed.data.cdps,
        k: parsed.data.topK,
      });
      res.status(200).json(answer);
    },

    askDetailed(req, res) {
      const parsed = askSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
        return;
      }

      if (rejectUnknownCdps(assistant, parsed.data.cdps, res)) {
        return;
      }

      const trace = assistant.answerQueryDetailed(parsed.data.message, {
        cdps: parsed.data.cdps,
        k: parsed.data.topK,
      });
      res.status(200).json(trace);
    },

    compare(req, res) {
      const parsed = compareSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
        return;
      }

      if (rejectUnknownCdps(assistant, parsed.data.cdps, res)) {
        return;
      }

      res.status(200).json(assistant.compare(parsed.data.feature, { cdps: parsed.data.cdps }));
    },

    status(_req, res) {
      res.status(200).json(assistant.status());
    },

    async reindex(_req, res) {
      if (!source) {
        res.status(409).json({ message: 'No document source configured' });
        return;
      }

      try {
        const result = await assistant.refresh(source);
        res.status(200).json(result);
      } catch (error) {
        console.error('[assistant] reindex failed:', error);
        res.status(500).json({ message: 'Reindex failed' });
      }
    },
  };
}
