/**
 * Markdown report for a research run.
 *
 * Frontmatter with the run metadata, then summary, sources, media and the
 * analysis sections that are present.
 */

import type { ReportRenderer } from '../pipeline/collaborators';
import type { PipelineState, SuccessAnalysis, VisualizationData } from '../types';

export interface MarkdownReportOptions {
    /** Overrides the generation timestamp in the frontmatter. */
    now?: () => Date;
    maxSources?: number;
}

function escapeInline(text: string): string {
    return text.replace(/([\\`*_[\]|])/g, '\\$1').replace(/\s+/g, ' ').trim();
}

function formatScore(value: number | undefined): string {
    return value === undefined ? 'n/a' : value.toFixed(2);
}

function analysisSections(analysis: SuccessAnalysis, visualization: VisualizationData): string[] {
    const lines: string[] = [];

    lines.push('## Summary', '', analysis.summary, '');

    const { sentiment } = analysis;
    lines.push('## Sentiment', '');
    lines.push(`- Classification: ${sentiment.classification}`);
    lines.push(`- Polarity: ${sentiment.polarity.toFixed(2)}`);
    lines.push(`- Subjectivity: ${sentiment.subjectivity.toFixed(2)}`);
    lines.push(`- Confidence: ${formatScore(sentiment.confidence)}`);
    lines.push('');

    if (analysis.topics.length > 0) {
        lines.push('## Topics', '');
        for (const topic of analysis.topics) {
            lines.push(`- **${escapeInline(topic.label)}** (${topic.weight.toFixed(2)}): ${topic.words.map(escapeInline).join(', ')}`);
        }
        lines.push('');
    }

    if (analysis.entities.length > 0) {
        lines.push('## Entities', '', '| Entity | Type | Confidence |', '|---|---|---|');
        for (const entity of analysis.entities) {
            lines.push(`| ${escapeInline(entity.text)} | ${entity.label} | ${formatScore(entity.confidence)} |`);
        }
        lines.push('');
    }

    if (visualization.edges.length > 0) {
        lines.push('## Relationships', '');
        for (const edge of visualization.edges) {
            const from = visualization.nodes[edge.from]?.label ?? String(edge.from);
            const to = visualization.nodes[edge.to]?.label ?? String(edge.to);
            lines.push(`- ${escapeInline(from)} → ${escapeInline(to)} (${edge.type})`);
        }
        lines.push('');
    }

    if (visualization.timelineDates.length > 0) {
        lines.push('## Timeline', '');
        visualization.timelineDates.forEach((date, i) => {
            lines.push(`- **${date}**: ${escapeInline(visualization.timelineEvents[i] ?? '')}`);
        });
        lines.push('');
    }

    if (analysis.relatedQueries.length > 0) {
        lines.push('## Related Queries', '');
        for (const related of analysis.relatedQueries) {
            lines.push(`- ${escapeInline(related.query)}`);
        }
        lines.push('');
    }

    return lines;
}

export function renderMarkdownReport(
    state: PipelineState,
    visualization: VisualizationData,
    options: MarkdownReportOptions = {}
): string {
    const now = options.now ?? (() => new Date());
    const maxSources = options.maxSources ?? 20;
    const lines: string[] = [];

    lines.push('---');
    lines.push(`query: "${state.query.replace(/"/g, '\\"')}"`);
    lines.push(`status: ${state.status}`);
    lines.push(`createdAt: ${state.createdAt}`);
    lines.push(`generatedAt: ${now().toISOString()}`);
    lines.push(`sources: ${state.searchResults.length}`);
    lines.push(`scraped: ${state.scrapedContent.filter(c => c.type !== 'error').length}/${state.scrapedContent.length}`);
    lines.push('---');
    lines.push('');
    lines.push(`# Research Report: ${escapeInline(state.query)}`);
    lines.push('');

    const analysis = state.analysis;
    if (!analysis) {
        lines.push('> Analysis unavailable for this run.', '');
    } else if (analysis.kind === 'empty') {
        lines.push(`> ${analysis.reason}`, '');
    } else {
        lines.push(...analysisSections(analysis, visualization));
    }

    if (state.searchResults.length > 0) {
        lines.push('## Sources', '');
        for (const result of state.searchResults.slice(0, maxSources)) {
            lines.push(`- [${escapeInline(result.title)}](${result.link}) (${escapeInline(result.source)}, credibility ${formatScore(result.credibility)})`);
        }
        lines.push('');
    }

    if (state.images.length > 0) {
        lines.push('## Images', '');
        for (const image of state.images) {
            lines.push(`- [${escapeInline(image.title)}](${image.link})`);
        }
        lines.push('');
    }

    if (state.videos.length > 0) {
        lines.push('## Videos', '');
        for (const video of state.videos) {
            lines.push(`- [${escapeInline(video.title)}](${video.link})`);
        }
        lines.push('');
    }

    return lines.join('\n');
}

export class MarkdownReportRenderer implements ReportRenderer {
    constructor(private readonly options: MarkdownReportOptions = {}) { }

    async render(state: PipelineState, visualization: VisualizationData): Promise<string | null> {
        return renderMarkdownReport(state, visualization, this.options);
    }
}
