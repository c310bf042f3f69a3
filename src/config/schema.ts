import { z } from 'zod';
import { LOG_LEVELS } from '../shared/Logger.js';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'], {
  errorMap: () => ({ message: `log.level must be one of ${LOG_LEVELS.join(', ')}` }),
});

/** .postindex.json 的 schema；未知 key 視為錯字，直接拒絕 */
export const PartialConfigSchema = z
  .object({
    version: z.number().int().optional(),
    content: z
      .object({
        root: z.string(),
        postsDir: z.string(),
        extensions: z.array(z.string()),
        exclude: z.array(z.string()),
      })
      .partial()
      .strict()
      .optional(),
    output: z.object({ indexPath: z.string() }).partial().strict().optional(),
    log: z.object({ level: LogLevelSchema }).partial().strict().optional(),
  })
  .strict();

export type PartialConfig = z.infer<typeof PartialConfigSchema>;
