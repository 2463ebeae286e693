import { describe, it, expect } from 'vitest';
import { decodeDiagram, encodeDiagram, open, save } from '../codec.js';
import { compressXml } from '../compression.js';
import { DiagramDocument } from '../document.js';
import { FormatError } from '../errors.js';
import { createLogger } from '../log.js';
import { absoluteBounds, danglingEndpoints, findElement, type DiagramElement, type Page } from '../model.js';

const SIMPLE = `<mxfile host="app.diagrams.net" version="24.1.0">
  <diagram id="page-1" name="Overview">
    <mxGraphModel dx="1000" grid="1" gridSize="10" pageWidth="850" pageHeight="1100" math="0">
      <root>
        <mxCell id="0"/>
        <mxCell id="1" parent="0"/>
        <mxCell id="A" value="Start" style="rounded=1;whiteSpace=wrap;html=1;" vertex="1" parent="1">
          <mxGeometry x="40" y="40" width="120" height="60" as="geometry"/>
        </mxCell>
        <mxCell id="B" value="End" style="ellipse;custom=keep" vertex="1" parent="1" tooltip="t">
          <mxGeometry x="240" y="40" width="80" height="80" as="geometry"/>
        </mxCell>
        <mxCell id="E" value="" style="edgeStyle=orthogonalEdgeStyle;" edge="1" parent="1" source="A" target="B">
          <mxGeometry relative="1" as="geometry">
            <Array as="points"><mxPoint x="200" y="70"/></Array>
          </mxGeometry>
        </mxCell>
      </root>
    </mxGraphModel>
  </diagram>
</mxfile>`;

const WRAPPED = `<mxfile id="d1" name="Wrapped">
  <diagram id="p" name="P">
    <mxGraphModel>
      <root>
        <mxCell id="0"/>
        <mxCell id="1" parent="0"/>
        <mxCell id="L2" value="Notes" parent="0" visible="0"/>
        <UserObject label="Server" owner="ops" id="S">
          <mxCell style="shape=cylinder3;" vertex="1" parent="L2">
            <mxGeometry width="60" height="80" as="geometry"/>
          </mxCell>
        </UserObject>
        <mxCell id="G" value="" style="group" vertex="1" connectable="0" parent="1">
          <mxGeometry x="100" y="100" width="200" height="100" as="geometry"/>
        </mxCell>
        <mxCell id="C" value="child" vertex="1" parent="G">
          <mxGeometry x="10" y="20" width="50" height="30" as="geometry"/>
        </mxCell>
      </root>
    </mxGraphModel>
  </diagram>
  <extra foo="1"/>
</mxfile>`;

const CROSS_PAGE = `<mxfile id="d2" name="Two pages">
  <diagram id="p1" name="One">
    <mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/>
      <mxCell id="A" value="A" vertex="1" parent="1"><mxGeometry x="10" y="10" width="80" height="40" as="geometry"/></mxCell>
    </root></mxGraphModel>
  </diagram>
  <diagram id="p2" name="Two">
    <mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/>
      <mxCell id="E" edge="1" parent="1" target="A">
        <mxGeometry relative="1" as="geometry"><mxPoint x="5" y="5" as="sourcePoint"/></mxGeometry>
      </mxCell>
    </root></mxGraphModel>
  </diagram>
</mxfile>`;

function get(page: Page, id: string): DiagramElement {
  const element = findElement(page, id);
  if (!element) throw new Error(`missing ${id}`);
  return element;
}

function formatError(fn: () => unknown): FormatError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FormatError) return err;
    throw err;
  }
  throw new Error('expected a FormatError');
}

// ── Decoding ─────────────────────────────────────────────────

describe('decodeDiagram', () => {
  it('should decode pages, cells and geometry', () => {
    const { diagram, compressed, unresolved } = decodeDiagram(SIMPLE);
    expect(compressed).toBe(false);
    expect(unresolved).toEqual([]);
    expect(diagram.name).toBe('Untitled Diagram');
    expect(diagram.version).toBe('24.1.0');
    expect(diagram.id).toMatch(/^[A-Za-z0-9]{20}$/);
    expect(diagram.extras.attributes).toEqual([['host', 'app.diagrams.net']]);

    const page = diagram.pages[0];
    expect(page.id).toBe('page-1');
    expect(page.name).toBe('Overview');
    expect(page.settings).toEqual({ grid: true, gridSize: 10, background: null, pageWidth: 850, pageHeight: 1100 });
    expect(page.extras.graphModel.attributes).toEqual([['dx', '1000'], ['math', '0']]);
    expect(page.rootCell?.id).toBe('0');
    expect(page.layers.map((l) => l.id)).toEqual(['1']);
    expect(page.elements.map((e) => e.id)).toEqual(['A', 'B', 'E']);

    const a = get(page, 'A');
    expect(a).toMatchObject({ kind: 'shape', label: 'Start', shapeType: 'rectangle', layerId: '1', parentId: null });
    expect(a.geometry).toMatchObject({ x: 40, y: 40, width: 120, height: 60 });

    const b = get(page, 'B');
    expect(b).toMatchObject({ kind: 'shape', shapeType: 'ellipse' });
    expect(b.extras.attributes).toEqual([['tooltip', 't']]);
    expect(b.style.text).toBe('ellipse;custom=keep');

    const e = get(page, 'E');
    expect(e).toMatchObject({ kind: 'connector', sourceId: 'A', targetId: 'B', routing: 'orthogonalEdgeStyle' });
    expect(e.geometry.points).toEqual([{ x: 200, y: 70 }]);
    expect(e.geometry.relative).toBe(true);
  });

  it('should unwrap user objects and keep extra layers', () => {
    const { diagram } = decodeDiagram(WRAPPED);
    const page = diagram.pages[0];
    expect(diagram).toMatchObject({ id: 'd1', name: 'Wrapped', version: null });
    expect(diagram.extras.children).toEqual([{ tag: 'extra', attributes: [['foo', '1']], children: [] }]);
    expect(page.layers[1]).toMatchObject({ id: 'L2', label: 'Notes', extras: { attributes: [['visible', '0']] } });

    const server = get(page, 'S');
    expect(server).toMatchObject({ kind: 'shape', label: 'Server', layerId: 'L2', shapeType: 'cylinder3' });
    expect(server.wrapper).toEqual({ tag: 'UserObject', attributes: [['owner', 'ops']], children: [] });

    const group = get(page, 'G');
    expect(group).toMatchObject({ kind: 'group', childIds: ['C'] });
    expect(group.extras.attributes).toEqual([['connectable', '0']]);

    const child = get(page, 'C');
    expect(child).toMatchObject({ parentId: 'G', layerId: '1' });
    expect(absoluteBounds(page, child)).toEqual({ x: 110, y: 120, width: 50, height: 30 });
  });

  it('should read a bare mxGraphModel as a single page', () => {
    const xml = '<mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/></root></mxGraphModel>';
    const { diagram } = decodeDiagram(xml, { defaultName: 'sketch' });
    expect(diagram.name).toBe('sketch');
    expect(diagram.pages.map((p) => p.name)).toEqual(['Page-1']);
  });

  it('should inflate compressed pages', () => {
    const model = '<mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/><mxCell id="X" vertex="1" parent="1"/></root></mxGraphModel>';
    const xml = `<mxfile><diagram id="z" name="Z">${compressXml(model)}</diagram></mxfile>`;
    const { diagram, compressed } = decodeDiagram(xml);
    expect(compressed).toBe(true);
    expect(diagram.pages[0].elements.map((e) => e.id)).toEqual(['X']);
  });

  it('should read an empty page', () => {
    const { diagram } = decodeDiagram('<mxfile><diagram id="e" name="Empty"></diagram></mxfile>');
    expect(diagram.pages[0]).toMatchObject({ id: 'e', rootCell: null, layers: [], elements: [] });
  });
});

// ── Dangling references ──────────────────────────────────────

describe('dangling references', () => {
  it('should keep an endpoint that names an element of another page', () => {
    const lines: string[] = [];
    const { diagram, unresolved } = decodeDiagram(CROSS_PAGE, { logger: createLogger('warn', (line) => lines.push(line)) });
    expect(unresolved).toEqual([{ pageId: 'p2', connectorId: 'E', side: 'target', ref: 'A' }]);
    expect(lines).toEqual([
      `[mxdoc pid:${process.pid}] warning: Keeping dangling reference: connector "E" target "A" on page "p2" does not resolve`,
    ]);
    expect(danglingEndpoints(diagram.pages[1])).toEqual([{ connectorId: 'E', side: 'target', ref: 'A' }]);

    const xml = encodeDiagram(diagram);
    expect(xml).toContain('target="A"');
    const again = decodeDiagram(xml).diagram;
    expect(get(again.pages[1], 'E')).toMatchObject({ targetId: 'A', geometry: { sourcePoint: { x: 5, y: 5 } } });
  });

  it('should detach dangling endpoints on request', () => {
    const { diagram, unresolved } = decodeDiagram(CROSS_PAGE, { danglingReferences: 'detach' });
    expect(unresolved).toEqual([]);
    expect(get(diagram.pages[1], 'E')).toMatchObject({ sourceId: null, targetId: null });
  });

  it('should reject dangling endpoints on request', () => {
    const err = formatError(() => decodeDiagram(CROSS_PAGE, { danglingReferences: 'reject' }));
    expect(err.kind).toBe('UnresolvableReference');
  });
});

// ── Malformed input ──────────────────────────────────────────

describe('malformed input', () => {
  it('should report broken XML with its line', () => {
    const err = formatError(() => decodeDiagram('<mxfile>\n<diagram>\n</mxfile>'));
    expect(err.kind).toBe('MalformedXML');
    expect(err.line).toBeGreaterThan(0);
    expect(err.message).toMatch(/^Malformed XML: /);
  });

  it('should refuse unknown roots and files without pages', () => {
    expect(formatError(() => decodeDiagram('<svg/>')).kind).toBe('MalformedXML');
    expect(formatError(() => decodeDiagram('<mxfile/>')).kind).toBe('MalformedXML');
  });

  it('should refuse bytes that are not UTF-8', () => {
    expect(formatError(() => decodeDiagram(new Uint8Array([0x3c, 0xff, 0x3e]))).kind).toBe('MalformedXML');
  });

  it('should name the node of a cell without id', () => {
    const err = formatError(() =>
      decodeDiagram('<mxGraphModel><root><mxCell id="0"/><mxCell parent="0"/></root></mxGraphModel>'),
    );
    expect(err.kind).toBe('MalformedXML');
    expect(err.path).toBe('mxGraphModel/root/mxCell[2]');
  });

  it('should report duplicate cell ids', () => {
    const xml = `<mxfile><diagram id="p" name="P"><mxGraphModel><root>
      <mxCell id="0"/><mxCell id="1" parent="0"/><mxCell id="1" vertex="1" parent="0"/>
    </root></mxGraphModel></diagram></mxfile>`;
    const err = formatError(() => decodeDiagram(xml));
    expect(err.kind).toBe('DuplicateId');
    expect(err.path).toBe('mxfile/diagram[1]/mxGraphModel/root/mxCell[3]');
  });

  it('should report duplicate page ids', () => {
    const page = '<diagram id="same" name="P"></diagram>';
    expect(formatError(() => decodeDiagram(`<mxfile>${page}${page}</mxfile>`)).kind).toBe('DuplicateId');
  });

  it('should report missing parents', () => {
    const xml = '<mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/><mxCell id="X" vertex="1" parent="nope"/></root></mxGraphModel>';
    const err = formatError(() => decodeDiagram(xml));
    expect(err.kind).toBe('UnresolvableReference');
    expect(err.path).toBe('mxGraphModel/root/mxCell[3]');
  });

  it('should report broken compressed pages', () => {
    const err = formatError(() => decodeDiagram('<mxfile><diagram id="p">!!!notbase64</diagram></mxfile>'));
    expect(err.kind).toBe('MalformedCompression');
    expect(err.message).toBe('Compressed page payload is not valid base64 (at mxfile/diagram[1])');
  });

  it('should report non-numeric geometry', () => {
    const xml = '<mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/><mxCell id="X" vertex="1" parent="1"><mxGeometry x="left" as="geometry"/></mxCell></root></mxGraphModel>';
    const err = formatError(() => decodeDiagram(xml));
    expect(err.kind).toBe('MalformedXML');
    expect(err.path).toBe('mxGraphModel/root/mxCell[3]/mxGeometry');
  });
});

// ── Round trips ──────────────────────────────────────────────

describe('round trip', () => {
  it('should reproduce decoded files', () => {
    for (const source of [SIMPLE, WRAPPED, CROSS_PAGE]) {
      const { diagram } = decodeDiagram(source);
      expect(decodeDiagram(encodeDiagram(diagram)).diagram).toEqual(diagram);
    }
  });

  it('should reproduce diagrams through the compressed envelope', () => {
    const { diagram } = decodeDiagram(WRAPPED);
    const result = decodeDiagram(encodeDiagram(diagram, { compressed: true }));
    expect(result.compressed).toBe(true);
    expect(result.diagram).toEqual(diagram);
  });

  it('should reproduce diagrams built by editing', () => {
    const doc = new DiagramDocument();
    const pageId = doc.diagram.pages[0].id;
    doc.createElement(pageId, { id: 'A', label: 'a & <b>', preset: 'ellipse' });
    doc.createElement(pageId, { id: 'B', x: 200, y: 80 });
    doc.connect(pageId, { id: 'E', sourceId: 'A', targetId: 'B', waypoints: [{ x: 150, y: 30 }] });
    doc.group(pageId, ['A', 'B'], { id: 'G' });
    doc.disconnect(pageId, 'E', 'source');
    doc.setVisibility(pageId, 'B', false);
    doc.addPage({ id: 'p2', name: 'Second' });
    doc.setMetadata({ version: '21.0.0' });

    expect(decodeDiagram(encodeDiagram(doc.diagram)).diagram).toEqual(doc.diagram);
  });

  it('should read groups without members back as groups', () => {
    const doc = new DiagramDocument();
    const pageId = doc.diagram.pages[0].id;
    doc.createElement(pageId, { id: 'G', kind: 'group', style: 'fillColor=none;' });
    doc.createElement(pageId, { id: 'A' });
    doc.group(pageId, ['A'], { id: 'H', style: 'strokeColor=none;' });
    doc.removeFromGroup(pageId, ['A']);

    const { diagram } = decodeDiagram(encodeDiagram(doc.diagram));
    const page = diagram.pages[0];
    expect(get(page, 'G')).toMatchObject({ kind: 'group', childIds: [] });
    expect(get(page, 'H')).toMatchObject({ kind: 'group', childIds: [], style: { text: 'group;strokeColor=none;' } });
    expect(diagram).toEqual(doc.diagram);
  });

  it('should keep XML comments', () => {
    const source = SIMPLE.replace('<mxCell id="0"/>', '<!-- generated --><mxCell id="0"/>');
    const { diagram } = decodeDiagram(source);
    expect(diagram.pages[0].extras.root.children).toEqual([{ comment: ' generated ' }]);

    const encoded = encodeDiagram(diagram);
    expect(encoded).toContain('<!-- generated -->');
    expect(decodeDiagram(encoded).diagram).toEqual(diagram);
  });

  it('should save and open bytes', () => {
    const { diagram } = decodeDiagram(SIMPLE);
    const bytes = save(diagram);
    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(open(bytes)).toEqual(diagram);
  });
});
