import {
	createConnection,
	TextDocuments,
	ProposedFeatures,
	type InitializeParams,
	DidChangeConfigurationNotification,
	TextDocumentSyncKind,
	type InitializeResult,
	type Connection,
	CodeActionKind,
	type Diagnostic,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { analyzeShader } from './core/pipeline';
import { codeActionsFor, sectionOf, settingsFrom, toLspDiagnostic, type ServerSettings } from './lsp';
import { defaultRules } from './rules';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

let settings: ServerSettings = settingsFrom(undefined);

function debug(message: string) {
	if (settings.debug) connection.console.log(`[glsl-style] ${message}`);
}

async function validateTextDocument(doc: TextDocument) {
	let diagnostics: Diagnostic[];
	try {
		const result = analyzeShader(doc.uri, doc.getText(), { disabled: settings.disabledRules, minSeverity: settings.minSeverity });
		diagnostics = result.diagnostics.map(toLspDiagnostic);
		debug(`${doc.uri} v${doc.version}: ${diagnostics.length} diagnostics`);
	} catch (e) {
		connection.console.error(`[glsl-style] analysis failed for ${doc.uri}: ${String(e)}`);
		diagnostics = [];
	}
	await connection.sendDiagnostics({ uri: doc.uri, diagnostics });
}

async function revalidateAllOpenDocs() {
	await Promise.all(documents.all().map(validateTextDocument));
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
	settings = settingsFrom(params.initializationOptions);
	debug(`initialize: ${settings.disabledRules.size} disabled rules`);
	return {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			codeActionProvider: { codeActionKinds: [CodeActionKind.QuickFix] },
		},
	};
});

connection.onInitialized(() => {
	connection.client.register(DidChangeConfigurationNotification.type, undefined).catch((e: unknown) => {
		connection.console.warn(`[glsl-style] configuration registration failed: ${String(e)}`);
	});
});

connection.onDidChangeConfiguration(async change => {
	const payload: unknown = change.settings;
	settings = settingsFrom(sectionOf(payload));
	debug('configuration changed: revalidating open documents');
	await revalidateAllOpenDocs();
});

documents.onDidChangeContent(async change => {
	await validateTextDocument(change.document);
});

documents.onDidClose(async e => {
	await connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
});

connection.onCodeAction(params => codeActionsFor(params.textDocument.uri, params.context.diagnostics, defaultRules));

connection.onShutdown(() => {
	connection.console.log('[glsl-style] onShutdown');
});

documents.listen(connection);
connection.listen();
