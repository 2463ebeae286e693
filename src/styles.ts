/** Predefined draw.io shape and edge styles */

import { StyleRegistry } from './style.js';

export const SHAPE_STYLES: Record<string, string> = {
  rectangle: 'rounded=0;whiteSpace=wrap;html=1;',
  roundedRectangle: 'rounded=1;whiteSpace=wrap;html=1;',
  ellipse: 'ellipse;whiteSpace=wrap;html=1;',
  diamond: 'rhombus;whiteSpace=wrap;html=1;',
  parallelogram: 'shape=parallelogram;perimeter=parallelogramPerimeter;whiteSpace=wrap;html=1;fixedSize=1;',
  hexagon: 'shape=hexagon;perimeter=hexagonPerimeter2;whiteSpace=wrap;html=1;fixedSize=1;',
  triangle: 'triangle;whiteSpace=wrap;html=1;',
  cylinder: 'shape=cylinder3;whiteSpace=wrap;html=1;boundedLbl=1;backgroundOutline=1;size=15;',
  cloud: 'ellipse;shape=cloud;whiteSpace=wrap;html=1;',
  document: 'shape=document;whiteSpace=wrap;html=1;boundedLbl=1;',
  process: 'shape=process;whiteSpace=wrap;html=1;',
  text: 'text;html=1;align=center;verticalAlign=middle;',
  // UML
  actor: 'shape=umlActor;verticalLabelPosition=bottom;verticalAlign=top;html=1;outlineConnect=0;',
  package: 'shape=folder;fontStyle=1;tabWidth=110;tabHeight=30;tabPosition=left;html=1;whiteSpace=wrap;',
  // Flowchart
  start: 'ellipse;whiteSpace=wrap;html=1;aspect=fixed;fillColor=#d5e8d4;strokeColor=#82b366;',
  end: 'ellipse;whiteSpace=wrap;html=1;aspect=fixed;fillColor=#f8cecc;strokeColor=#b85450;',
  decision: 'rhombus;whiteSpace=wrap;html=1;fillColor=#fff2cc;strokeColor=#d6b656;',
  container: 'rounded=1;whiteSpace=wrap;html=1;dashed=1;dashPattern=5 5;fillColor=none;strokeColor=#666666;fontSize=14;fontStyle=1;verticalAlign=top;spacingTop=5;',
};

// Base edge properties for readable labels (white background behind text)
const EDGE_LABEL_BASE = 'fontSize=11;fontFamily=Helvetica;labelBackgroundColor=#ffffff;';

export const EDGE_STYLES: Record<string, string> = {
  // Routing styles
  straight: EDGE_LABEL_BASE,
  orthogonal: `edgeStyle=orthogonalEdgeStyle;rounded=1;${EDGE_LABEL_BASE}`,
  curved: `curved=1;${EDGE_LABEL_BASE}`,
  entityRelation: `edgeStyle=entityRelationEdgeStyle;${EDGE_LABEL_BASE}`,
  elbowHorizontal: `edgeStyle=elbowEdgeStyle;elbow=horizontal;${EDGE_LABEL_BASE}`,
  elbowVertical: `edgeStyle=elbowEdgeStyle;elbow=vertical;${EDGE_LABEL_BASE}`,
  // Arrow types
  arrow: `endArrow=block;endFill=1;${EDGE_LABEL_BASE}`,
  openArrow: `endArrow=open;endFill=0;${EDGE_LABEL_BASE}`,
  dashed: `dashed=1;${EDGE_LABEL_BASE}`,
  bidirectional: `endArrow=block;endFill=1;startArrow=block;startFill=1;${EDGE_LABEL_BASE}`,
  noArrow: `endArrow=none;endFill=0;${EDGE_LABEL_BASE}`,
};

/** Style given to groups created by the editor, as draw.io does */
export const GROUP_STYLE = 'group;';

/**
 * Connection point presets for controlling where edges attach to nodes.
 * Values are fractions (0-1) of the node's width (x) and height (y).
 *
 *   (0,0)----(0.5,0)----(1,0)
 *     |                    |
 *   (0,0.5)            (1,0.5)
 *     |                    |
 *   (0,1)----(0.5,1)----(1,1)
 */
export const CONNECTION_POINTS: Record<string, { x: number; y: number }> = {
  top:         { x: 0.5, y: 0 },
  bottom:      { x: 0.5, y: 1 },
  left:        { x: 0, y: 0.5 },
  right:       { x: 1, y: 0.5 },
  topLeft:     { x: 0, y: 0 },
  topRight:    { x: 1, y: 0 },
  bottomLeft:  { x: 0, y: 1 },
  bottomRight: { x: 1, y: 1 },
};

export const DEFAULT_GEOMETRY = {
  x: 0,
  y: 0,
  width: 120,
  height: 60,
};

/** Build exit/entry style fragments from connection point names */
export function buildConnectionStyle(exitPoint?: string, entryPoint?: string): string {
  let extra = '';
  if (exitPoint && CONNECTION_POINTS[exitPoint]) {
    const p = CONNECTION_POINTS[exitPoint];
    extra += `exitX=${p.x};exitY=${p.y};exitDx=0;exitDy=0;`;
  }
  if (entryPoint && CONNECTION_POINTS[entryPoint]) {
    const p = CONNECTION_POINTS[entryPoint];
    extra += `entryX=${p.x};entryY=${p.y};entryDx=0;entryDy=0;`;
  }
  return extra;
}

/** Registry preloaded with every shape and edge preset */
export function createDefaultRegistry(): StyleRegistry {
  const registry = new StyleRegistry();
  for (const [name, style] of Object.entries(SHAPE_STYLES)) registry.register(name, style);
  for (const [name, style] of Object.entries(EDGE_STYLES)) registry.register(name, style);
  return registry;
}
