import type Database from "better-sqlite3";
import type { GraphEdgeRecord } from "../types.js";

type EdgeRow = {
  source_node: string;
  target_node: string;
  relation: string;
  company: string;
  confidence: number;
};

/** Where the causal graph writes its edges. */
export interface EdgeStore {
  /** Insert each edge unless (source, target, relation, company) exists; returns how many were new. */
  upsertMany(edges: GraphEdgeRecord[]): number;
}

export class EdgeDB implements EdgeStore {
  private readonly qUpsert: Database.Statement<[string, string, string, string, number, string]>;
  private readonly qForCompany: Database.Statement<[string], EdgeRow>;

  constructor(private readonly db: Database.Database) {
    this.qUpsert = db.prepare<[string, string, string, string, number, string]>(
      `INSERT INTO graph_edges (source_node, target_node, relation, company, confidence, created_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT (source_node, target_node, relation, company) DO NOTHING`
    );
    this.qForCompany = db.prepare<[string], EdgeRow>(
      `SELECT source_node, target_node, relation, company, confidence
       FROM graph_edges WHERE company = ? ORDER BY id`
    );
  }

  /** Insert unless (source, target, relation, company) exists; true if written. */
  upsert(edge: GraphEdgeRecord): boolean {
    const info = this.qUpsert.run(
      edge.source,
      edge.target,
      edge.relation,
      edge.company,
      edge.confidence,
      new Date().toISOString()
    );
    return info.changes === 1;
  }

  /** Upsert a batch atomically; returns how many were new. */
  upsertMany(edges: GraphEdgeRecord[]): number {
    const tx = this.db.transaction((batch: GraphEdgeRecord[]) =>
      batch.reduce((n, e) => n + (this.upsert(e) ? 1 : 0), 0)
    );
    return tx(edges);
  }

  edgesFor(company: string): GraphEdgeRecord[] {
    return this.qForCompany.all(company).map((r) => ({
      source: r.source_node,
      target: r.target_node,
      relation: r.relation,
      company: r.company,
      confidence: r.confidence,
    }));
  }
}
