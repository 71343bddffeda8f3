import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { createRepositoryBundleFromConfig } from '../repositories.js';
import { createCourse } from '../../modules/courses/course.model.js';
import { createTestConfig } from '../../testing/test-utils.js';

describe('createRepositoryBundleFromConfig', () => {
  it('keeps data in process for the memory provider', async () => {
    const bundle = createRepositoryBundleFromConfig(createTestConfig());
    const course = bundle.course.save(createCourse({ tenantId: 'tenant-1', ownerId: 'owner-1', title: 'Memory' }));

    expect(bundle.course.getById('tenant-1', course.id)).toEqual(course);
    await bundle.dispose?.();
  });

  it('opens one database file per tenant for the sqlite provider', async () => {
    const dbRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'course-engine-bundle-'));
    const bundle = createRepositoryBundleFromConfig(createTestConfig({
      persistence: {
        provider: 'sqlite',
        sqlite: { dbRoot, filePattern: 'tenant-{tenantId}.db', migrationsDir: path.resolve('migrations', 'sqlite') },
      },
    }));
    try {
      bundle.course.save(createCourse({ tenantId: 'alpha', ownerId: 'owner-1', title: 'A' }));
      bundle.course.save(createCourse({ tenantId: 'beta', ownerId: 'owner-1', title: 'B' }));

      expect(fs.readdirSync(dbRoot).sort()).toEqual(['tenant-alpha.db', 'tenant-beta.db']);
      expect(bundle.course.listByOwner('alpha', 'owner-1').map(course => course.title)).toEqual(['A']);
    } finally {
      await bundle.dispose?.();
      fs.rmSync(dbRoot, { recursive: true, force: true });
    }
  });
});
