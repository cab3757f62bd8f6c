import { Router, Request, Response, NextFunction } from 'express';
import '../types/express';
import { CourseCatalog } from '../services/catalog';
import { CoursePicker } from '../services/coursePicker';
import { selectRequestSchema } from '../schemas/request';
import { RawCourseRecord } from '../types';
import { CatalogUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';
import { createRandom, randomSeed } from '../utils/random';
import { buildSelectResponse, describeSolution } from '../utils/responseBuilder';

export interface SelectRouterDeps {
  picker: CoursePicker;
  catalog?: CourseCatalog;
  maxSearchSteps?: number;
}

/**
 * POST /api/select
 * Pick up to three exact-credit, conflict-free course sets
 *
 * Request: { "targetCredits": 6, "fields": ["AI"], "formats": [], "busySchedule": "mon. 09:00-10:30", "courses": [...] }
 * Response: { "ok": true, "solutions": [{ "rank": 1, "totalCredits": 6, "courses": [...] }], "debug": {...} }
 */
export function createSelectRouter(deps: SelectRouterDeps): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = selectRequestSchema.parse(req.body);
      const startTime = Date.now();

      let pool: RawCourseRecord[];
      if (body.courses) {
        pool = body.courses;
      } else if (deps.catalog) {
        pool = await deps.catalog.listCourses({ semester: body.semester, maxCredit: body.targetCredits });
      } else {
        throw new CatalogUnavailableError('No course catalog is configured; send the candidate pool as "courses"');
      }

      const seed = body.seed ?? randomSeed();
      const result = deps.picker.selectCourses(
        pool,
        {
          constraints: {
            targetCredits: body.targetCredits,
            fields: new Set(body.fields),
            formats: new Set(body.formats),
          },
          busySchedule: body.busySchedule,
        },
        {
          random: createRandom(seed),
          maxSearchSteps: body.maxSearchSteps ?? deps.maxSearchSteps,
          requestId: req.requestId,
        }
      );

      logger.debug('Selected solutions', {
        requestId: req.requestId,
        seed,
        solutions: result.solutions.map(describeSolution),
      });

      res.json(buildSelectResponse(result, { seed, executionTime: Date.now() - startTime }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
