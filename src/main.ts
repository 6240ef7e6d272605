import * as fs from 'fs/promises';
import * as portfinder from 'portfinder';
import { HighlightController } from './adapters/controllers/HighlightController';
import { createTypeScriptHighlightDependencies, TsWorkspace } from './adapters/gateways/typescript';
import { loadConfig } from './infrastructure/config';
import { ProjectFileScanner } from './infrastructure/file/ProjectFileScanner';
import { createServer } from './infrastructure/server/server';
import { GetDocumentHighlightsUseCase } from './usecases/engine/GetDocumentHighlightsUseCase';
import { HighlightSymbolUseCase } from './usecases/HighlightSymbolUseCase';
import { SyncDocumentUseCase } from './usecases/SyncDocumentUseCase';
import { getDaemonFilePath } from './utils/daemon';

async function bootstrap() {
  try {
    const config = loadConfig();
    const daemonFile = getDaemonFilePath(config.rootPath);

    // 1. Infrastructure (Drivers)
    console.log(`Loading project ${config.rootPath}...`);
    const workspace = await TsWorkspace.load(config.rootPath, new ProjectFileScanner());
    console.log(`Loaded ${workspace.listDocuments().length} documents.`);

    // 2. UseCases (Application Business Rules)
    const engine = new GetDocumentHighlightsUseCase(createTypeScriptHighlightDependencies(workspace));
    const highlightSymbolUC = new HighlightSymbolUseCase(engine, workspace);
    const syncDocumentUC = new SyncDocumentUseCase(workspace);

    // 3. Controllers
    const controller = new HighlightController(highlightSymbolUC, syncDocumentUC);

    // 4. Server
    const server = createServer(controller);

    const port = await portfinder.getPortPromise({ port: config.basePort });

    await server.listen({ port, host: config.host });
    console.log(`Server listening on http://${config.host}:${port}`);

    const daemonInfo = { port, pid: process.pid };
    await fs.writeFile(daemonFile, JSON.stringify(daemonInfo));

    const shutdown = async () => {
      console.log('Shutting down...');
      await fs.rm(daemonFile, { force: true });
      await server.close();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error) => {
        console.error('Failed to shut down cleanly:', error);
        process.exit(1);
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void bootstrap();
