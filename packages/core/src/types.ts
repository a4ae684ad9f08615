// --------------------
// Schema model (validated, normalized)
// --------------------
export interface ColumnConstraints {
  required?: boolean;
  unique?: boolean;
}

export interface Column {
  name: string;
  type: string;
  constraints: ColumnConstraints;
  defaultValue?: string;
  description?: string;
}

export interface Index {
  name: string;
  definition: string;
  fields: string[];
  primary: boolean;
  unique: boolean;
}

export type Cardinality = '0..1' | '1' | '0..N' | '1..N';

export interface Reference {
  namespace: string;
  table: string;
  fields: string[];
  name?: string;
  label?: string;
  // raw tokens; anything outside Cardinality degrades to "no marker"
  cardinalitySelf?: string;
  cardinalityRef?: string;
}

export interface ForeignKey {
  fields: string[];
  reference: Reference;
  enforced: boolean;
}

export interface Table {
  namespace: string;
  name: string;
  description?: string;
  columns: Column[];
  primaryKey: string[];
  uniqueGroups: string[][];
  indexes: Index[];
  foreignKeys: ForeignKey[];
}

export interface Namespace {
  name: string;
  tables: Table[];
}

export interface SchemaModel {
  databaseName: string;
  generatedAt: string;
  namespaces: Namespace[];
}

// --------------------
// Structured label (rows of cells)
// --------------------
export type TextRun =
  | { text: string; bold?: boolean; strike?: boolean; size?: number }
  | { br: true };

export interface LabelCell {
  runs: TextRun[];
  bgcolor?: string;
  color?: string;
  align?: 'LEFT' | 'CENTER' | 'RIGHT';
  balign?: 'LEFT' | 'CENTER' | 'RIGHT';
  colspan?: number;
  port?: string;
}

export interface LabelRow {
  kind: 'title' | 'column' | 'indexes';
  column?: string;   // set on column rows
  port?: number;     // row position, equals portOf(table, column)
  highlight?: boolean;
  cells: LabelCell[];
}

export interface LabelTable {
  id: string;
  bgcolor: string;
  rows: LabelRow[];
}

// --------------------
// Declarative graph (handed to the layout engine)
// --------------------
export type AttrValue = string | number | boolean;
export type Attrs = Record<string, AttrValue>;

export type ArrowSymbol = 'none' | 'teeodot' | 'teetee' | 'crowodot' | 'crowtee';

export interface NodeSpec {
  kind: 'table';
  id: string;
  namespace: string;
  table: string;
  record: LabelTable;
  label: string;     // HTML-like markup generated from `record`
  attrs: Attrs;
}

export interface JunctionSpec {
  kind: 'junction';
  id: string;
  side: 'tail' | 'head';
  attrs: Attrs;
}

export type EdgeKind = 'relation' | 'connector' | 'plain';

export interface EdgeSpec {
  kind: EdgeKind;
  tail: string;
  head: string;
  tailPort?: string;
  headPort?: string;
  attrs: Attrs;
}

export interface GraphStats {
  tables: number;
  renderedTables: number;
  omittedTables: number;
  foreignKeys: number;
  junctions: number;
  edges: number;
}

export interface GraphSpec {
  name: string;
  strict: boolean;
  directed: boolean;
  attrs: Attrs;
  nodes: NodeSpec[];
  junctions: JunctionSpec[];
  edges: EdgeSpec[];
  stats: GraphStats;
}

// --------------------
// Layout engine seam (external; DOT in, image out)
// --------------------
export type OutputFormat = 'svg' | 'png' | 'pdf';

export interface LayoutRenderer {
  name: string;
  render(dot: string, format: OutputFormat): Promise<Buffer>;
  health(): Promise<{ ok: boolean; details?: Record<string, unknown> }>;
}
