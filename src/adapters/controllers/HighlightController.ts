import { FastifyReply, FastifyRequest } from 'fastify';
import { CancellationTokenSource, DocumentHighlightKind } from 'vscode-languageserver-protocol';
import { isCancellationError } from '../../domain/cancellation';
import { HighlightRef } from '../../domain/entities';
import {
  DocumentNotFoundError,
  InvalidIdError,
  InvalidPositionError,
} from '../../domain/errors';
import { HighlightSymbolUseCase } from '../../usecases/HighlightSymbolUseCase';
import { SyncDocumentUseCase } from '../../usecases/SyncDocumentUseCase';

export type HighlightsQuery = { id: string; scope?: string[] };
export type SyncDocumentBody = { path: string; text: string };

export class HighlightController {
  constructor(
    private readonly highlightSymbolUC: HighlightSymbolUseCase,
    private readonly syncDocumentUC: SyncDocumentUseCase,
  ) { }

  async highlights(req: FastifyRequest<{ Querystring: HighlightsQuery }>, reply: FastifyReply) {
    const { id, scope } = req.query;
    const source = new CancellationTokenSource();
    // The client went away before we answered.
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) {
        source.cancel();
      }
    });

    try {
      const result = await this.highlightSymbolUC.execute(id, scope, source.token);
      return reply.send({
        documents: result.documents.map((document) => ({
          filePath: document.filePath,
          highlights: document.highlights.map((highlight) => ({
            ...highlight,
            kind: toHighlightKind(highlight),
          })),
        })),
      });
    } catch (error) {
      return this.handleError(error, reply);
    } finally {
      source.dispose();
    }
  }

  async syncDocument(req: FastifyRequest<{ Body: SyncDocumentBody }>, reply: FastifyReply) {
    const { path, text } = req.body;
    try {
      const result = this.syncDocumentUC.execute(path, text);
      return reply.status(result.created ? 201 : 200).send(result);
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  private handleError(error: unknown, reply: FastifyReply) {
    if (isCancellationError(error)) {
      return reply.status(499).send({ error: error.message });
    }
    console.error(error);
    if (error instanceof DocumentNotFoundError) {
      return reply.status(404).send({ error: error.message });
    }
    if (error instanceof InvalidIdError || error instanceof InvalidPositionError) {
      return reply.status(400).send({ error: error.message });
    }
    return reply.status(500).send({ error: 'Internal Server Error' });
  }
}

function toHighlightKind(highlight: HighlightRef): DocumentHighlightKind {
  return highlight.role === 'definition' ? DocumentHighlightKind.Write : DocumentHighlightKind.Read;
}
