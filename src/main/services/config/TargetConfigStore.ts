import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { TargetRegistration } from '@shared/contracts';
import { updaterOptionsSchema } from '@main/services/config/UpdaterConfig';
import { describeError, type UpdaterLogger } from '@main/services/logging/Logger';

const registrationSchema = z
  .object({
    packageFile: z.string().trim().min(1),
    repository: z.string().trim().min(1),
    config: updaterOptionsSchema.default({})
  })
  .strict();

const fileSchema = z.object({
  targets: z.array(registrationSchema)
});

/**
 * Registration list kept in `{baseDir}/config/updater.targets.json`.
 * An absent file is created empty; an invalid one is reported and treated as empty.
 */
export class TargetConfigStore {
  private readonly filePath: string;
  private cache: TargetRegistration[];

  constructor(
    baseDir: string,
    private readonly logger: UpdaterLogger
  ) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'updater.targets.json');
    this.cache = this.load();
  }

  list(): TargetRegistration[] {
    return this.cache.map((item) => ({ ...item, config: { ...item.config } }));
  }

  upsert(registration: TargetRegistration): TargetRegistration[] {
    const parsed = registrationSchema.parse(registration);
    const next = this.cache.filter((item) => item.packageFile !== parsed.packageFile);
    next.push(parsed);
    this.cache = next;
    this.persist(next);
    return this.list();
  }

  remove(packageFile: string): boolean {
    const next = this.cache.filter((item) => item.packageFile !== packageFile);
    if (next.length === this.cache.length) {
      return false;
    }

    this.cache = next;
    this.persist(next);
    return true;
  }

  private load(): TargetRegistration[] {
    if (!fs.existsSync(this.filePath)) {
      this.persist([]);
      return [];
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = fileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data.targets;
      }

      this.logger.warn('config.targets.invalid', {
        filePath: this.filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      });
    } catch (error) {
      this.logger.warn('config.targets.unreadable', {
        filePath: this.filePath,
        error: describeError(error)
      });
    }

    return [];
  }

  private persist(targets: TargetRegistration[]): void {
    fs.writeFileSync(this.filePath, JSON.stringify({ targets }, null, 2), 'utf-8');
  }
}
