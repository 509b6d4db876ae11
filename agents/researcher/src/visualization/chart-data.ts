import type { Logger } from '@content-research/shared';
import type { Visualizer } from '../pipeline/collaborators';
import type {
    Entity,
    GraphEdge,
    GraphNode,
    Relationship,
    SuccessAnalysis,
    TimelineEvent,
    Topic,
    VisualizationData
} from '../types';

export const MAX_GRAPH_NODES = 50;
export const MAX_GRAPH_EDGES = 100;
export const MAX_TIMELINE_ENTRIES = 20;
export const MAX_WORDS_PER_TOPIC = 3;
export const TREEMAP_ROOT = 'Topics';

const DEFAULT_CONFIDENCE = 0.5;

/**
 * Turns a successful analysis into chart-ready series: an entity graph, a
 * date-sorted timeline and a topic treemap.
 */
export class ChartDataBuilder implements Visualizer {
    constructor(private readonly logger?: Logger) { }

    visualize(analysis: SuccessAnalysis): VisualizationData {
        const { nodes, edges } = this.buildGraph(analysis.entities, analysis.relationships);
        const { dates, events } = this.buildTimeline(analysis.timeline);
        const { labels, parents, values } = this.buildTreemap(analysis.topics);

        this.logger?.info(`Visualization data generated: ${nodes.length} nodes, ${edges.length} edges, ${dates.length} timeline events`);
        return {
            nodes,
            edges,
            timelineDates: dates,
            timelineEvents: events,
            treemapLabels: labels,
            treemapParents: parents,
            treemapValues: values
        };
    }

    /** Edges whose endpoints are not among the kept nodes are dropped. */
    buildGraph(entities: Entity[], relationships: Relationship[]): { nodes: GraphNode[]; edges: GraphEdge[] } {
        const ids = new Map<string, number>();
        const nodes = entities.slice(0, MAX_GRAPH_NODES).map((entity, id) => {
            ids.set(entity.text.toLowerCase(), id);
            return {
                id,
                label: entity.text,
                type: entity.label,
                confidence: entity.confidence ?? DEFAULT_CONFIDENCE
            };
        });

        const edges: GraphEdge[] = [];
        for (const relationship of relationships.slice(0, MAX_GRAPH_EDGES)) {
            const from = ids.get(relationship.fromEntity.toLowerCase());
            const to = ids.get(relationship.toEntity.toLowerCase());
            if (from === undefined || to === undefined) continue;
            edges.push({
                from,
                to,
                type: relationship.relationshipType,
                confidence: relationship.confidence ?? DEFAULT_CONFIDENCE
            });
        }
        return { nodes, edges };
    }

    buildTimeline(timeline: TimelineEvent[]): { dates: string[]; events: string[] } {
        const sorted = [...timeline]
            .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
            .slice(0, MAX_TIMELINE_ENTRIES);
        return {
            dates: sorted.map(e => e.date),
            events: sorted.map(e => e.event)
        };
    }

    /**
     * Root "Topics" (parent "", value 0), one node per topic, and up to three
     * keyword children per topic sharing the topic's weight.
     */
    buildTreemap(topics: Topic[]): { labels: string[]; parents: string[]; values: number[] } {
        const labels = [TREEMAP_ROOT];
        const parents = [''];
        const values = [0];

        for (const topic of topics) {
            labels.push(topic.label);
            parents.push(TREEMAP_ROOT);
            values.push(topic.weight);

            for (const word of topic.words.slice(0, MAX_WORDS_PER_TOPIC)) {
                labels.push(word);
                parents.push(topic.label);
                values.push(topic.weight / topic.words.length);
            }
        }
        return { labels, parents, values };
    }
}
