import * as ts from 'typescript';
import { CancellationToken } from 'vscode-languageserver-protocol';
import { throwIfCancellationRequested } from '../../../domain/cancellation';
import { DocumentId, ReferencedSymbol, ReferenceLocation } from '../../../domain/entities';
import { CodeSymbol, SymbolKind } from '../../../domain/symbols';
import { createTextSpan } from '../../../domain/TextSpan';
import { IReferenceSearchService } from '../../../usecases/ports/IReferenceSearchService';
import { findTouchingNodes } from './nodes';
import { TsProgramContext } from './TsProgramContext';
import { TsWorkspace } from './TsWorkspace';

/** Reference search backed by `LanguageService.findReferences`. */
export class TsReferenceSearchService implements IReferenceSearchService {
  constructor(private readonly workspace: TsWorkspace) {}

  async findReferences(
    symbol: CodeSymbol,
    documentIds: ReadonlySet<DocumentId>,
    token: CancellationToken,
  ): Promise<ReferencedSymbol[]> {
    throwIfCancellationRequested(token);

    const anchor = symbol.locations[0];
    const context = this.workspace.getProgramContext();
    if (!anchor || !context.program.getSourceFile(anchor.treeId)) {
      return [];
    }

    const referenced = this.workspace.languageService.findReferences(anchor.treeId, anchor.span.start) ?? [];
    throwIfCancellationRequested(token);

    return referenced.map((r) => ({
      definition: this.resolveDefinition(context, r.definition),
      locations: r.references
        // Declarations are reported through the definition's own locations.
        .filter((entry) => !entry.isDefinition && documentIds.has(entry.fileName))
        .map((entry) => this.toReferenceLocation(context, entry)),
    }));
  }

  private resolveDefinition(context: TsProgramContext, definition: ts.ReferencedSymbolDefinitionInfo): CodeSymbol {
    const symbol = this.getSymbolAt(context, definition.fileName, definition.textSpan.start);
    if (symbol) {
      return context.symbols.map(symbol);
    }

    // Keywords, literals and the like have no symbol; keep their span as the definition.
    return {
      kind: SymbolKind.Other,
      name: definition.name,
      locations: [
        {
          treeId: definition.fileName,
          span: createTextSpan(definition.textSpan.start, definition.textSpan.length),
          isInSource: this.workspace.hasDocument(definition.fileName),
        },
      ],
      isImplicitlyDeclared: false,
    };
  }

  private toReferenceLocation(context: TsProgramContext, entry: ts.ReferencedSymbolEntry): ReferenceLocation {
    const referenced = this.getSymbolAt(context, entry.fileName, entry.textSpan.start);
    const alias =
      referenced && referenced.flags & ts.SymbolFlags.Alias ? context.symbols.map(referenced) : undefined;

    return {
      location: {
        treeId: entry.fileName,
        span: createTextSpan(entry.textSpan.start, entry.textSpan.length),
        isInSource: this.workspace.hasDocument(entry.fileName),
      },
      alias,
    };
  }

  private getSymbolAt(context: TsProgramContext, fileName: string, position: number): ts.Symbol | undefined {
    const sourceFile = context.program.getSourceFile(fileName);
    if (!sourceFile) {
      return undefined;
    }
    for (const node of findTouchingNodes(sourceFile, position)) {
      const symbol = context.checker.getSymbolAtLocation(node);
      if (symbol) {
        return symbol;
      }
    }
    return undefined;
  }
}
