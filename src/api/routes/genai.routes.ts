/**
 * GenAI system engineering API.
 * GET /genai/status plus one POST per engineering task. Façade results are
 * relayed with 200 whatever their status; only a missing façade is a 503.
 */

import express, { Router, Request, Response, NextFunction } from 'express';
import { body } from 'express-validator';
import { validate } from '../middleware/validate';
import type { SystemEngineeringService } from '../../services/genai/SystemEngineeringService';
import type { GenAIStatus } from '../../types';

interface AnalyzeRequirementsBody {
  requirements_text: string;
}

interface GenerateDesignBody {
  specifications: string;
  design_type?: string | null;
}

interface AssessRisksBody {
  system_description: string;
}

interface GenerateTestCasesBody {
  requirements: string;
  test_type?: string | null;
}

interface OptimizeSystemBody {
  system_config: Record<string, unknown>;
  optimization_goal?: string | null;
}

export const UNAVAILABLE_MESSAGE = 'GenAI functionality is not available';

export const TASK_PATHS = [
  '/analyze-requirements',
  '/generate-design',
  '/assess-risks',
  '/generate-test-cases',
  '/optimize-system',
] as const;

/** `null` and absent tags both fall back to the façade default. */
function optionalTag(value: string | null | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalString(field: string) {
  return body(field).optional({ values: 'null' }).isString().withMessage(`${field} must be a string`);
}

export function getGenAIStatus(genai: SystemEngineeringService | null): GenAIStatus {
  if (!genai) {
    return {
      enabled: false,
      message: 'GenAI module is not available. Install required dependencies.',
    };
  }
  if (genai.isEnabled()) {
    return {
      enabled: true,
      message: 'GenAI System Engineering is ready',
      model: genai.model,
    };
  }
  return {
    enabled: false,
    message: 'GenAI is not configured. Please set OPENAI_API_KEY environment variable.',
  };
}

export function createGenAIRoutes(genai: SystemEngineeringService | null): Router {
  const router = Router();

  router.get('/status', (_req: Request, res: Response) => {
    res.json(getGenAIStatus(genai));
  });

  if (!genai) {
    // No body parsing or validation here, so every body gets the 503.
    for (const path of TASK_PATHS) {
      router.post(path, (_req: Request, res: Response) => {
        res.status(503).json({ error: UNAVAILABLE_MESSAGE });
      });
    }
    return router;
  }
  const service = genai;
  router.use(express.json({ limit: '1mb' }));

  /** POST /genai/analyze-requirements - { requirements_text } */
  router.post(
    '/analyze-requirements',
    validate([body('requirements_text').isString().withMessage('requirements_text must be a string')]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: AnalyzeRequirementsBody = req.body;
        res.json(await service.analyzeRequirements(payload.requirements_text));
      } catch (e) {
        next(e);
      }
    }
  );

  /** POST /genai/generate-design - { specifications, design_type? } */
  router.post(
    '/generate-design',
    validate([
      body('specifications').isString().withMessage('specifications must be a string'),
      optionalString('design_type'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: GenerateDesignBody = req.body;
        res.json(await service.generateDesign(payload.specifications, optionalTag(payload.design_type)));
      } catch (e) {
        next(e);
      }
    }
  );

  /** POST /genai/assess-risks - { system_description } */
  router.post(
    '/assess-risks',
    validate([body('system_description').isString().withMessage('system_description must be a string')]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: AssessRisksBody = req.body;
        res.json(await service.assessRisks(payload.system_description));
      } catch (e) {
        next(e);
      }
    }
  );

  /** POST /genai/generate-test-cases - { requirements, test_type? } */
  router.post(
    '/generate-test-cases',
    validate([
      body('requirements').isString().withMessage('requirements must be a string'),
      optionalString('test_type'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: GenerateTestCasesBody = req.body;
        res.json(await service.generateTestCases(payload.requirements, optionalTag(payload.test_type)));
      } catch (e) {
        next(e);
      }
    }
  );

  /** POST /genai/optimize-system - { system_config, optimization_goal? } */
  router.post(
    '/optimize-system',
    validate([
      body('system_config').isObject().withMessage('system_config must be an object'),
      optionalString('optimization_goal'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const payload: OptimizeSystemBody = req.body;
        res.json(await service.optimizeSystem(payload.system_config, optionalTag(payload.optimization_goal)));
      } catch (e) {
        next(e);
      }
    }
  );

  return router;
}
