import type { CytoscapeOptions, ElementDefinition } from 'cytoscape';
import type { Entity } from '@/lib/entities/types';
import { TERM_CONFIG } from '@/lib/relationships/term-config';
import type { Relationship } from '@/lib/relationships/types';
import type { GraphEdge, SubgraphResult } from './types';

type Rgb = readonly [number, number, number];

export type GraphStylesheet = Exclude<NonNullable<CytoscapeOptions['style']>, Promise<unknown>>;

const NEGATIVE: Rgb = [239, 68, 68];
const NEUTRAL: Rgb = [156, 163, 175];
const POSITIVE: Rgb = [16, 185, 129];

export const NODE_COLORS: Record<Entity['kind'], string> = {
  account: '#4f46e5',
  contact: '#06b6d4',
};

function toHex([r, g, b]: Rgb): string {
  return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}

function interpolate(from: Rgb, to: Rgb, factor: number): Rgb {
  return [
    Math.trunc(from[0] + (to[0] - from[0]) * factor),
    Math.trunc(from[1] + (to[1] - from[1]) * factor),
    Math.trunc(from[2] + (to[2] - from[2]) * factor),
  ];
}

/**
 * Red at -100 through gray at 0 to green at +100. Unscored edges are gray.
 */
export function edgeColor(score: number | null): string {
  if (score === null) return toHex(NEUTRAL);
  const clamped = Math.max(-100, Math.min(100, score));
  if (clamped < 0) {
    return toHex(interpolate(NEGATIVE, NEUTRAL, (clamped + 100) / 100));
  }
  return toHex(interpolate(NEUTRAL, POSITIVE, clamped / 100));
}

/** "Friend (+80)", "Enemy (-100)", "Works for" */
export function edgeLabel(rel: Pick<Relationship, 'term' | 'score'>): string {
  const label = TERM_CONFIG[rel.term].label;
  if (rel.score === null) return label;
  const sign = rel.score > 0 ? '+' : '';
  return `${label} (${sign}${rel.score})`;
}

function nodeElement(entity: Entity): ElementDefinition {
  return {
    group: 'nodes',
    data: {
      id: entity.id,
      label: entity.name,
      type: entity.kind,
      subtitle: entity.kind === 'account' ? entity.ticker : entity.jobTitle,
      color: NODE_COLORS[entity.kind],
    },
    classes: `kind-${entity.kind}`,
  };
}

function edgeElement(rel: GraphEdge): ElementDefinition {
  return {
    group: 'edges',
    data: {
      id: rel.id,
      source: rel.sourceId,
      target: rel.targetId,
      label: edgeLabel(rel),
      term: rel.term,
      category: rel.category,
      score: rel.score,
      color: edgeColor(rel.score),
      directed: rel.directed,
      deleted: rel.deleted,
      derived: rel.derived === true,
    },
    classes: rel.deleted ? 'deleted' : rel.derived ? `category-${rel.category} derived` : `category-${rel.category}`,
  };
}

/** Nodes first, then edges, in the subgraph's id order */
export function toGraphElements(subgraph: SubgraphResult): ElementDefinition[] {
  return [...subgraph.nodes.map(nodeElement), ...subgraph.edges.map(edgeElement)];
}

export function getGraphStyles(): GraphStylesheet {
  return [
    {
      selector: 'node',
      style: {
        'label': 'data(label)',
        'background-color': 'data(color)',
        'text-valign': 'bottom',
        'text-halign': 'center',
        'font-size': '12px',
        'text-wrap': 'wrap',
        'text-max-width': '100px',
      },
    },

    {
      selector: 'node.kind-account',
      style: {
        'shape': 'roundrectangle',
        'width': '48px',
        'height': '48px',
      },
    },

    {
      selector: 'node.kind-contact',
      style: {
        'shape': 'ellipse',
        'width': '36px',
        'height': '36px',
      },
    },

    {
      selector: 'edge',
      style: {
        'label': 'data(label)',
        'line-color': 'data(color)',
        'target-arrow-color': 'data(color)',
        'curve-style': 'bezier',
        'width': 2,
        'font-size': '10px',
        'text-rotation': 'autorotate',
      },
    },

    {
      selector: 'edge[?directed]',
      style: {
        'target-arrow-shape': 'triangle',
      },
    },

    {
      selector: 'edge.derived',
      style: {
        'line-style': 'dotted',
      },
    },

    {
      selector: 'edge.deleted',
      style: {
        'line-style': 'dashed',
        'opacity': 0.5,
      },
    },
  ];
}
