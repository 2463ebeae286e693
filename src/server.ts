import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { CONNECTION_POINTS, EDGE_STYLES, SHAPE_STYLES } from './styles.js';
import type { DiagramTools } from './tools.js';

const filePath = z.string().describe('Path to the .drawio file');
const pageIndex = z.number().int().min(0).optional().describe('Page index (0-based, default: 0)');
const point = z.object({ x: z.number(), y: z.number() });

export function createServer(tools: DiagramTools, version: string): McpServer {
  const server = new McpServer({ name: 'mxdoc', version });

  server.tool(
    'create_diagram',
    'Create a new draw.io diagram file with one empty page.',
    {
      filePath: z.string().describe('Path for the new .drawio file (relative or absolute)'),
      pageName: z.string().optional().describe('Name of the first page (default: "Page-1")'),
    },
    async (args) => tools.createDiagram(args)
  );

  server.tool(
    'read_diagram',
    'Read a draw.io diagram file and summarize its pages, nodes, edges and dangling references.',
    { filePath },
    async (args) => tools.readDiagram(args)
  );

  server.tool(
    'list_diagrams',
    'List .drawio and .dio files under a directory, recursively.',
    { dir: z.string().describe('Directory to search') },
    async (args) => tools.listDiagrams(args)
  );

  server.tool(
    'add_node',
    'Add a shape to a page. Use "shape" for a predefined style, or pass a custom "style" string (appended after the preset).',
    {
      filePath,
      pageIndex,
      label: z.string().describe('Text label displayed inside the node'),
      shape: z.string().optional().describe(`Predefined shape name. Available: ${Object.keys(SHAPE_STYLES).join(', ')}`),
      style: z.string().optional().describe('Custom draw.io style string'),
      x: z.number().optional().describe('X position (default: 0)'),
      y: z.number().optional().describe('Y position (default: 0)'),
      width: z.number().optional().describe('Width in pixels (default: 120)'),
      height: z.number().optional().describe('Height in pixels (default: 60)'),
      parentId: z.string().optional().describe('Group to place the node in; coordinates are then relative to it'),
      id: z.string().optional().describe('Custom ID for the node (auto-generated if not provided)'),
    },
    async (args) => tools.addNode(args)
  );

  server.tool(
    'add_edge',
    'Connect two nodes. exitPoint/entryPoint choose where the edge leaves and enters its nodes.',
    {
      filePath,
      pageIndex,
      sourceId: z.string().describe('ID of the source node'),
      targetId: z.string().describe('ID of the target node'),
      label: z.string().optional().describe('Label for the edge'),
      edgeStyle: z.string().optional().describe(`Predefined edge style. Available: ${Object.keys(EDGE_STYLES).join(', ')}`),
      style: z.string().optional().describe('Custom draw.io style string'),
      exitPoint: z.string().optional().describe(`Where the edge leaves the source. Available: ${Object.keys(CONNECTION_POINTS).join(', ')}`),
      entryPoint: z.string().optional().describe(`Where the edge enters the target. Available: ${Object.keys(CONNECTION_POINTS).join(', ')}`),
      waypoints: z.array(point).optional().describe('Intermediate points the edge is routed through'),
      id: z.string().optional().describe('Custom ID for the edge'),
    },
    async (args) => tools.addEdge(args)
  );

  server.tool(
    'update_element',
    'Change the label, style or geometry of an element. All given changes are applied as one undoable step.',
    {
      filePath,
      pageIndex,
      id: z.string().describe('ID of the element'),
      label: z.string().optional().describe('New label'),
      style: z.string().optional().describe('Replacement style string'),
      styleValues: z
        .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
        .optional()
        .describe('Individual style keys to set; null removes a key'),
      x: z.number().optional(),
      y: z.number().optional(),
      width: z.number().optional(),
      height: z.number().optional(),
    },
    async (args) => tools.updateElement(args)
  );

  server.tool(
    'remove_element',
    'Remove an element with its group members and edge labels. Edges attached to it are detached, or removed with cascade.',
    {
      filePath,
      pageIndex,
      id: z.string().describe('ID of the element to remove'),
      cascade: z.boolean().optional().describe('Also remove edges connected to the removed elements'),
    },
    async (args) => tools.removeElement(args)
  );

  server.tool(
    'group_elements',
    'Group elements that share a parent into a new group sized to their bounds.',
    {
      filePath,
      pageIndex,
      ids: z.array(z.string()).min(1).describe('IDs of the elements to group'),
      label: z.string().optional(),
      id: z.string().optional().describe('Custom ID for the group'),
    },
    async (args) => tools.groupElements(args)
  );

  server.tool(
    'ungroup_elements',
    'Dissolve a group, keeping its members in place.',
    { filePath, pageIndex, groupId: z.string().describe('ID of the group') },
    async (args) => tools.ungroupElements(args)
  );

  server.tool(
    'add_page',
    'Add a new page to a diagram.',
    { filePath, name: z.string().describe('Name of the new page') },
    async (args) => tools.addPage(args)
  );

  server.tool('undo', 'Undo the last change made to a diagram in this session.', { filePath }, async (args) => tools.undo(args));

  server.tool('redo', 'Redo the last undone change.', { filePath }, async (args) => tools.redo(args));

  server.tool(
    'get_history',
    'Show the undo/redo position for a diagram in this session.',
    { filePath },
    async (args) => tools.getHistory(args)
  );

  return server;
}
