export * from './errors.js';
export * from './log.js';
export * from './config.js';
export * from './style.js';
export * from './styles.js';
export * from './geometry.js';
export * from './model.js';
export * from './events.js';
export {
  createDiagram,
  DiagramDocument,
  type ConnectInput,
  type DocumentOptions,
  type GroupInput,
  type PageInput,
  type RemovalSummary,
  type ShapeInput,
} from './document.js';
export * from './codec.js';
export { compressXml, decompressXml } from './compression.js';
export * as commands from './commands.js';
export type { Command } from './commands.js';
export * from './history.js';
export * from './editor.js';
export * from './files.js';
export type { OpaqueFields, XmlAttribute, XmlComment, XmlElement, XmlNode, XmlText } from './xml.js';
