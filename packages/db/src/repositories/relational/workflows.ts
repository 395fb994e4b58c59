import { and, eq, inArray, type SQL } from 'drizzle-orm';
import {
  ID_PREFIXES,
  NotFoundError,
  addPrefix,
  stripPrefix,
  type ListQuery,
  type ListResponse,
  type Workflow,
} from '@threadline/sdk';
import type { DbClient } from '../../client.js';
import { workflowTags, workflows } from '../../schema/index.js';
import type { WorkflowFilter, WorkflowRepository } from '../types.js';
import { existsQuietly } from '../exists.js';
import { cursorOrder, cursorWhere, guard, toPage, workspaceVisible } from './shared.js';

type WorkflowRow = typeof workflows.$inferSelect;

export class RelationalWorkflowRepository implements WorkflowRepository {
  constructor(private readonly db: DbClient) {}

  /** Tags live in `workflow_tags`; load them for a batch of rows. */
  private withTags(rows: WorkflowRow[]): Workflow[] {
    if (rows.length === 0) return [];
    const tagRows = guard('read workflow tags', () =>
      this.db
        .select()
        .from(workflowTags)
        .where(
          inArray(
            workflowTags.workflowId,
            rows.map((row) => row.id)
          )
        )
        .orderBy(workflowTags.id)
        .all()
    );
    const tagsById = new Map<string, string[]>();
    for (const { workflowId, tag } of tagRows) {
      tagsById.set(workflowId, [...(tagsById.get(workflowId) ?? []), tag]);
    }
    return rows.map((row) => ({
      ...row,
      id: addPrefix(ID_PREFIXES.workflow, row.id),
      assistantId: addPrefix(ID_PREFIXES.assistant, row.assistantId),
      tags: tagsById.get(row.id) ?? [],
    }));
  }

  private writeTags(rawId: string, tags: string[]) {
    this.db.delete(workflowTags).where(eq(workflowTags.workflowId, rawId)).run();
    if (tags.length > 0) {
      this.db
        .insert(workflowTags)
        .values(tags.map((tag) => ({ workflowId: rawId, tag })))
        .run();
    }
  }

  async create(workflow: Workflow): Promise<Workflow> {
    const { tags, ...values } = workflow;
    const rawId = stripPrefix(workflow.id);
    guard('create workflow', () =>
      this.db.transaction(() => {
        this.db
          .insert(workflows)
          .values({ ...values, id: rawId, assistantId: stripPrefix(values.assistantId) })
          .run();
        this.writeTags(rawId, tags);
      })
    );
    return workflow;
  }

  async findOne(id: string, filters?: WorkflowFilter): Promise<Workflow> {
    const row = guard('read workflow', () =>
      this.db
        .select()
        .from(workflows)
        .where(
          and(
            eq(workflows.id, stripPrefix(id)),
            workspaceVisible(workflows.workspaceId, filters?.workspaceId)
          )
        )
        .get()
    );
    const [workflow] = row ? this.withTags([row]) : [];
    if (!workflow) throw NotFoundError.forResource('Workflow', id);
    return workflow;
  }

  async update(workflow: Workflow): Promise<Workflow> {
    const { id, tags, ...values } = workflow;
    const rawId = stripPrefix(id);
    const changes = guard('update workflow', () =>
      this.db.transaction(() => {
        const result = this.db
          .update(workflows)
          .set({ ...values, assistantId: stripPrefix(values.assistantId) })
          .where(eq(workflows.id, rawId))
          .run();
        if (result.changes > 0) this.writeTags(rawId, tags);
        return result.changes;
      })
    );
    if (changes === 0) throw NotFoundError.forResource('Workflow', id);
    return workflow;
  }

  async delete(id: string, filters?: WorkflowFilter): Promise<void> {
    await this.findOne(id, filters);
    const rawId = stripPrefix(id);
    guard('delete workflow', () =>
      this.db.transaction(() => {
        this.db.delete(workflowTags).where(eq(workflowTags.workflowId, rawId)).run();
        this.db.delete(workflows).where(eq(workflows.id, rawId)).run();
      })
    );
  }

  async find(query: ListQuery, filters?: WorkflowFilter): Promise<ListResponse<Workflow>> {
    const conditions: Array<SQL | undefined> = [
      ...cursorWhere(workflows.id, query),
      workspaceVisible(workflows.workspaceId, filters?.workspaceId),
    ];
    if (filters?.tags && filters.tags.length > 0) {
      conditions.push(
        inArray(
          workflows.id,
          this.db
            .select({ id: workflowTags.workflowId })
            .from(workflowTags)
            .where(inArray(workflowTags.tag, filters.tags))
        )
      );
    }
    const rows = guard('list workflows', () =>
      this.db
        .select()
        .from(workflows)
        .where(and(...conditions))
        .orderBy(cursorOrder(workflows.id, query))
        .limit(query.limit + 1)
        .all()
    );
    return toPage(this.withTags(rows), query, (workflow) => workflow.id);
  }

  async exists(id: string, filters?: WorkflowFilter): Promise<boolean> {
    return existsQuietly(() => this.findOne(id, filters));
  }
}
