import { and, eq } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type FileObject,
  type ListQuery,
  type ListResponse,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { files } from '../../schema/index.js';
import type { FileRepository, WorkspaceFilter } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage, workspaceVisible } from './shared.js';

function toFileObject(row: typeof files.$inferSelect): FileObject {
  return { ...row, id: addPrefix(ID_PREFIXES.file, row.id) };
}

export class RelationalFileRepository implements FileRepository {
  constructor(private readonly db: DbClient) {}

  async create(file: FileObject): Promise<FileObject> {
    guard('create file', () =>
      this.db
        .insert(files)
        .values({ ...file, id: stripPrefix(file.id) })
        .run()
    );
    return file;
  }

  async findOne(id: string, filters?: WorkspaceFilter): Promise<FileObject> {
    const row = guard('read file', () =>
      this.db
        .select()
        .from(files)
        .where(
          and(
            eq(files.id, stripPrefix(id)),
            workspaceVisible(files.workspaceId, filters?.workspaceId)
          )
        )
        .get()
    );
    if (!row) throw NotFoundError.forResource('File', id);
    return toFileObject(row);
  }

  async update(file: FileObject): Promise<FileObject> {
    const { id, ...values } = file;
    const result = guard('update file', () =>
      this.db.update(files).set(values).where(eq(files.id, stripPrefix(id))).run()
    );
    if (result.changes === 0) throw NotFoundError.forResource('File', id);
    return file;
  }

  async delete(id: string, filters?: WorkspaceFilter): Promise<void> {
    await this.findOne(id, filters);
    guard('delete file', () =>
      this.db.delete(files).where(eq(files.id, stripPrefix(id))).run()
    );
  }

  async find(query: ListQuery, filters?: WorkspaceFilter): Promise<ListResponse<FileObject>> {
    const rows = guard('list files', () =>
      this.db
        .select()
        .from(files)
        .where(
          and(
            ...cursorWhere(files.id, query),
            workspaceVisible(files.workspaceId, filters?.workspaceId)
          )
        )
        .orderBy(cursorOrder(files.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(rows.map(toFileObject), query, (file) => file.id);
  }

  async exists(id: string, filters?: WorkspaceFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
