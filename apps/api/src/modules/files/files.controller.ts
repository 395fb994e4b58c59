import type { FastifyInstance } from 'fastify';
import { InvalidArgumentError, parseListQuery, toFileObject, toListObject } from '@threadline/sdk';
import type { RouteOptions } from '../../context.js';
import { workspaceIdOf } from '../../workspace.js';
import { uploadMetadataSchema } from './files.schema.js';
import {
  contentDispositionFor,
  deleteFile,
  getFile,
  listFiles,
  openFileContent,
  uploadFile,
} from './files.service.js';

export async function fileRoutes(app: FastifyInstance, { ctx }: RouteOptions) {
  app.post('/files', async (req, reply) => {
    const workspaceId = workspaceIdOf(req);
    const upload = await req.file();
    if (!upload) {
      throw new InvalidArgumentError('Expected a multipart file part');
    }

    const metadata = uploadMetadataSchema.parse({ filename: upload.filename, mimetype: upload.mimetype });
    const file = await uploadFile(ctx, workspaceId, {
      filename: metadata.filename,
      mediaType: metadata.mimetype,
      content: upload.file,
    });

    app.log.info({ fileId: file.id, workspaceId, size: file.size }, 'File uploaded');
    return reply.status(201).send(toFileObject(file));
  });

  app.get('/files', async (req) => {
    const workspaceId = workspaceIdOf(req);
    const query = parseListQuery(req.query);
    return toListObject(await listFiles(ctx, workspaceId, query), toFileObject);
  });

  app.get<{ Params: { id: string } }>('/files/:id', async (req) => {
    return toFileObject(await getFile(ctx, workspaceIdOf(req), req.params.id));
  });

  app.get<{ Params: { id: string } }>('/files/:id/content', async (req, reply) => {
    const { file, content } = await openFileContent(ctx, workspaceIdOf(req), req.params.id);
    return reply
      .header('content-type', file.mediaType)
      .header('content-disposition', contentDispositionFor(file.filename))
      .send(content);
  });

  app.delete<{ Params: { id: string } }>('/files/:id', async (req) => {
    const { id } = req.params;
    await deleteFile(ctx, workspaceIdOf(req), id);
    return { id, object: 'file.deleted', deleted: true };
  });
}
