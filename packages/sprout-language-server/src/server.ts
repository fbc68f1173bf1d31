/**
 * Sprout Language Server: LSP features for .sprout files.
 *
 * Runs as a standalone Node.js process spawned by an editor client.
 * Communicates via stdio or IPC using the Language Server Protocol.
 *
 * Features:
 *   • Real-time diagnostics  (syntax errors + scope errors)
 *   • Hover information      (entity bindings, references, generated names)
 */
import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  type InitializeResult,
  TextDocumentSyncKind,
  type Hover,
} from "vscode-languageserver/node.js";
import { format } from "node:util";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createCompiler } from "sprout-dsl";
import { toLspDiagnostics } from "./diagnostics.js";
import { hoverAt } from "./hover.js";

// ── Connection & document manager ──────────────────────────────────────────

const connection = createConnection(ProposedFeatures.all);
const documents  = new TextDocuments(TextDocument);

const compiler = createCompiler({
  cacheSize: 32,
  warnOnExternalReferences: true,
  logger: {
    debug: (...args) => connection.console.log(format(...args)),
    info:  (...args) => connection.console.info(format(...args)),
    // Diagnostics reach the client through publishDiagnostics instead
    warn:  () => {},
    error: () => {},
  },
});

connection.onInitialize((): InitializeResult => ({
  capabilities: {
    textDocumentSync: TextDocumentSyncKind.Incremental,
    hoverProvider: true,
  },
}));

// ── Diagnostics ────────────────────────────────────────────────────────────

function validate(doc: TextDocument): void {
  const text = doc.getText();

  // Empty or whitespace-only file: clear any previous diagnostics
  if (!text.trim()) {
    connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
    return;
  }

  const { diagnostics } = compiler.compilePartial(text);
  connection.sendDiagnostics({ uri: doc.uri, diagnostics: toLspDiagnostics(diagnostics) });
}

documents.onDidChangeContent(change => validate(change.document));
documents.onDidOpen(e => validate(e.document));
documents.onDidClose(e =>
  connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] }),
);

// ── Hover ──────────────────────────────────────────────────────────────────

connection.onHover((params): Hover | null => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;
  return hoverAt(compiler.compilePartial(doc.getText()), doc.offsetAt(params.position));
});

// ── Start ──────────────────────────────────────────────────────────────────

documents.listen(connection);
connection.listen();
