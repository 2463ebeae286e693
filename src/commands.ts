/**
 * Command factories. A command names one document operation with its
 * arguments fixed; ids of created records are generated when the command
 * is built so that replaying it reproduces them.
 */

import type { DiagramDocument, ConnectInput, GroupInput, PageInput, RemovalSummary, ShapeInput } from './document.js';
import { generateId, type ConnectorElement, type DeletePolicy, type DiagramElement, type EndpointSide, type GroupElement, type Page, type PageSettings } from './model.js';
import type { Point } from './geometry.js';
import type { StylePatch } from './style.js';

export interface Command<T = unknown> {
  /** Shown for undo/redo */
  readonly label: string;
  execute(document: DiagramDocument): T;
}

export function createElement(pageId: string, input: ShapeInput = {}): Command<DiagramElement> {
  const fixed = { ...input, id: input.id ?? generateId() };
  return {
    label: fixed.kind === 'group' ? 'Add group' : 'Add shape',
    execute: (doc) => doc.createElement(pageId, fixed),
  };
}

export function connect(pageId: string, input: ConnectInput): Command<ConnectorElement> {
  const fixed = { ...input, id: input.id ?? generateId() };
  return { label: 'Add connector', execute: (doc) => doc.connect(pageId, fixed) };
}

export function reconnect(pageId: string, connectorId: string, side: EndpointSide, ref: string): Command<void> {
  return { label: `Reconnect ${side}`, execute: (doc) => doc.reconnect(pageId, connectorId, side, ref) };
}

export function disconnect(pageId: string, connectorId: string, side: EndpointSide): Command<void> {
  return { label: `Disconnect ${side}`, execute: (doc) => doc.disconnect(pageId, connectorId, side) };
}

export function setWaypoints(pageId: string, connectorId: string, points: readonly Point[]): Command<void> {
  const fixed = [...points];
  return { label: 'Edit waypoints', execute: (doc) => doc.setWaypoints(pageId, connectorId, fixed) };
}

export function moveElement(pageId: string, id: string, position: Point): Command<void> {
  return { label: 'Move', execute: (doc) => doc.moveElement(pageId, id, position) };
}

export function resizeElement(pageId: string, id: string, width: number, height: number): Command<void> {
  return { label: 'Resize', execute: (doc) => doc.resizeElement(pageId, id, width, height) };
}

export function restyleElement(pageId: string, id: string, style: string | StylePatch): Command<void> {
  const fixed = typeof style === 'string' ? style : { ...style };
  return { label: 'Change style', execute: (doc) => doc.restyleElement(pageId, id, fixed) };
}

export function relabelElement(pageId: string, id: string, label: string): Command<void> {
  return { label: 'Edit label', execute: (doc) => doc.relabelElement(pageId, id, label) };
}

export function setVisibility(pageId: string, id: string, visible: boolean): Command<void> {
  return { label: visible ? 'Show' : 'Hide', execute: (doc) => doc.setVisibility(pageId, id, visible) };
}

export function setLocked(pageId: string, id: string, locked: boolean): Command<void> {
  return { label: locked ? 'Lock' : 'Unlock', execute: (doc) => doc.setLocked(pageId, id, locked) };
}

export function setCollapsed(pageId: string, groupId: string, collapsed: boolean): Command<void> {
  return { label: collapsed ? 'Collapse' : 'Expand', execute: (doc) => doc.setCollapsed(pageId, groupId, collapsed) };
}

export function group(pageId: string, ids: readonly string[], input: GroupInput = {}): Command<GroupElement> {
  const members = [...ids];
  const fixed = { ...input, id: input.id ?? generateId() };
  return { label: 'Group', execute: (doc) => doc.group(pageId, members, fixed) };
}

export function ungroup(pageId: string, groupId: string): Command<string[]> {
  return { label: 'Ungroup', execute: (doc) => doc.ungroup(pageId, groupId) };
}

export function addToGroup(pageId: string, groupId: string, ids: readonly string[]): Command<void> {
  const members = [...ids];
  return { label: 'Add to group', execute: (doc) => doc.addToGroup(pageId, groupId, members) };
}

export function removeFromGroup(pageId: string, ids: readonly string[]): Command<void> {
  const members = [...ids];
  return { label: 'Remove from group', execute: (doc) => doc.removeFromGroup(pageId, members) };
}

export function deleteElement(pageId: string, id: string, policy?: DeletePolicy): Command<RemovalSummary> {
  return { label: 'Delete', execute: (doc) => doc.deleteElement(pageId, id, policy) };
}

export function reorderElement(pageId: string, id: string, index: number): Command<void> {
  return { label: 'Change order', execute: (doc) => doc.reorderElement(pageId, id, index) };
}

export function addPage(input: PageInput = {}): Command<Page> {
  const fixed = { ...input, id: input.id ?? generateId() };
  return { label: 'Add page', execute: (doc) => doc.addPage(fixed) };
}

export function removePage(pageId: string): Command<void> {
  return { label: 'Remove page', execute: (doc) => doc.removePage(pageId) };
}

export function renamePage(pageId: string, name: string): Command<void> {
  return { label: 'Rename page', execute: (doc) => doc.renamePage(pageId, name) };
}

export function movePage(pageId: string, index: number): Command<void> {
  return { label: 'Move page', execute: (doc) => doc.movePage(pageId, index) };
}

export function updatePageSettings(pageId: string, settings: Partial<PageSettings>): Command<void> {
  const fixed = { ...settings };
  return { label: 'Page setup', execute: (doc) => doc.updatePageSettings(pageId, fixed) };
}

export function setMetadata(metadata: { name?: string; version?: string | null }): Command<void> {
  const fixed = { ...metadata };
  return { label: 'Edit diagram properties', execute: (doc) => doc.setMetadata(fixed) };
}

/** Several commands as one history step; the first failure aborts the whole batch */
export function batch(label: string, commands: readonly Command[]): Command<unknown[]> {
  const steps = [...commands];
  return { label, execute: (doc) => steps.map((command) => command.execute(doc)) };
}
