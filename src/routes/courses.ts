import { Router, Request, Response, NextFunction } from 'express';
import '../types/express';
import { CourseCatalog } from '../services/catalog';
import { coursesQuerySchema } from '../schemas/request';
import { CatalogUnavailableError, FormatError } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseDates } from '../utils/timeParser';
import { TimeInterval } from '../types';

/**
 * GET /api/courses
 * Query params: semester, maxCredit
 */
export function createCoursesRouter(catalog: CourseCatalog | undefined): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = coursesQuerySchema.parse(req.query);

      if (!catalog) {
        throw new CatalogUnavailableError('No course catalog is configured');
      }

      const courses = await catalog.listCourses(query);

      // Attach weekly intervals so clients can draw the timetable
      const coursesForFrontend = courses.map(course => {
        let intervals: TimeInterval[] | null = null;
        try {
          intervals = parseDates(course.Dates).intervals;
        } catch (error) {
          if (!(error instanceof FormatError)) throw error;
          logger.warn('Catalog course has unparsable dates', {
            requestId: req.requestId,
            name: course.Name,
            dates: course.Dates,
          });
        }
        return { ...course, intervals };
      });

      res.json({
        courses: coursesForFrontend,
        count: coursesForFrontend.length,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
