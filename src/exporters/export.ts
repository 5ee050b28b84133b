import { writeFileSync } from 'node:fs';
import { LineageDatabase } from '../storage/database.js';
import { DEFAULT_CONFIG, type AnalyticsOptions, type CitationEdge, type Entity } from '../types/index.js';
import type { CitationGraph } from '../graph/citation-graph.js';
import { computeDerivedStats } from '../graph/algorithms.js';
import { componentLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'graphml' | 'csv' | 'mermaid';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'graphml', 'csv', 'mermaid'];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    graphml: '.graphml',
    csv: '.csv',
    mermaid: '.md',
};

/** Mermaid diagrams stop rendering edges past this many */
export const MERMAID_MAX_EDGES = 100;

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export the graph stored in a lineage database to a file.
 */
export function exportGraph(
    dbPath: string,
    outputPath: string,
    format: ExportFormat,
    options: AnalyticsOptions = DEFAULT_CONFIG
): void {
    const db = new LineageDatabase(dbPath);

    try {
        const graph = db.loadGraph();
        const content = renderGraph(graph, format, options);

        writeFileSync(outputPath, content, 'utf-8');
        componentLogger('export').info({ format, outputPath, entities: graph.order, edges: graph.size }, 'Graph exported');
    } finally {
        db.close();
    }
}

/**
 * Render a graph in one of the export formats.
 */
export function renderGraph(
    graph: CitationGraph,
    format: ExportFormat,
    options: AnalyticsOptions = DEFAULT_CONFIG
): string {
    switch (format) {
        case 'json':
            return exportJson(graph, options);
        case 'graphml':
            return exportGraphML(graph);
        case 'csv':
            return exportCSV(graph);
        case 'mermaid':
            return exportMermaid(graph);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(graph: CitationGraph, options: AnalyticsOptions): string {
    return JSON.stringify(
        {
            predigraph: {
                version: VERSION,
                exported_at: new Date().toISOString(),
            },
            entities: graph.entities(),
            edges: graph.edges(),
            notices: graph.getNotices(),
            stats: computeDerivedStats(graph, options),
        },
        null,
        2
    );
}

function exportGraphML(graph: CitationGraph): string {
    const esc = (s: string | null | undefined) =>
        (s ?? '').replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="applicant" for="node" attr.name="applicant" attr.type="string"/>
  <key id="device_name" for="node" attr.name="device_name" attr.type="string"/>
  <key id="decision_date" for="node" attr.name="decision_date" attr.type="string"/>
  <key id="product_code" for="node" attr.name="product_code" attr.type="string"/>
  <key id="device_type" for="node" attr.name="device_type" attr.type="string"/>
  <key id="is_stub" for="node" attr.name="is_stub" attr.type="boolean"/>
  <key id="ordinal" for="edge" attr.name="ordinal" attr.type="int"/>
  <key id="source" for="edge" attr.name="source" attr.type="string"/>
  <graph id="predigraph" edgedefault="directed">
`;

    for (const entity of graph.entities()) {
        xml += `    <node id="${esc(entity.key)}">
      <data key="applicant">${esc(entity.applicant)}</data>
      <data key="device_name">${esc(entity.deviceName)}</data>
      <data key="decision_date">${esc(entity.decisionDate)}</data>
      <data key="product_code">${esc(entity.productCode)}</data>
      <data key="device_type">${entity.deviceType}</data>
      <data key="is_stub">${entity.isStub}</data>
    </node>
`;
    }

    for (const edge of graph.edges()) {
        xml += `    <edge source="${esc(edge.citing)}" target="${esc(edge.cited)}">
      <data key="ordinal">${edge.ordinal}</data>
      <data key="source">${edge.source}</data>
    </edge>
`;
    }

    xml += `  </graph>
</graphml>`;

    return xml;
}

function exportCSV(graph: CitationGraph): string {
    const quote = (s: string | null) => `"${(s ?? '').replace(/"/g, '""')}"`;

    // Entities first, then edges after a marker line
    let csv = 'key,device_type,applicant,device_name,decision_date,product_code,review_days,is_stub\n';
    for (const entity of graph.entities()) {
        csv += entityCsvRow(entity, quote) + '\n';
    }

    csv += '\n# EDGES\nciting,cited,ordinal,source,sources\n';
    for (const edge of graph.edges()) {
        csv += edgeCsvRow(edge) + '\n';
    }

    return csv;
}

function entityCsvRow(entity: Entity, quote: (s: string | null) => string): string {
    return [
        entity.key,
        entity.deviceType,
        quote(entity.applicant),
        quote(entity.deviceName),
        entity.decisionDate ?? '',
        entity.productCode ?? '',
        entity.reviewDays ?? '',
        entity.isStub,
    ].join(',');
}

function edgeCsvRow(edge: CitationEdge): string {
    return [edge.citing, edge.cited, edge.ordinal, edge.source, edge.sources.join(';')].join(',');
}

function exportMermaid(graph: CitationGraph): string {
    let diagram = 'graph TD\n';

    const ids = new Map<string, string>();
    graph.entityKeys().forEach((key, i) => ids.set(key, `E${i}`));

    for (const entity of graph.entities()) {
        const name = entity.deviceName ? ` ${entity.deviceName.slice(0, 40)}` : '';
        const label = `${entity.key}${name}`.replace(/"/g, "'");
        diagram += `  ${ids.get(entity.key) ?? entity.key}["${label}"]\n`;
    }

    diagram += '\n';

    const edges = graph.edges();
    for (const edge of edges.slice(0, MERMAID_MAX_EDGES)) {
        // Edges declared by more than one source render thick
        const style = edge.sources.length > 1 ? '==>' : '-->';
        diagram += `  ${ids.get(edge.citing) ?? edge.citing} ${style} ${ids.get(edge.cited) ?? edge.cited}\n`;
    }

    if (edges.length > MERMAID_MAX_EDGES) {
        diagram += `\n  %% Note: ${edges.length - MERMAID_MAX_EDGES} additional edges omitted\n`;
    }

    return diagram;
}
