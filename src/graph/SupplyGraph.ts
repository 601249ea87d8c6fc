import Graph from "graphology";
import type { EdgeStore } from "../db/EdgeDB.js";
import { log } from "../logger.js";
import type { Company, GraphEdgeRecord, NodeKind, Severity } from "../types.js";

type NodeAttrs = { kind: NodeKind | string; severity?: Severity };
type EdgeAttrs = { relation: string; confidence: number };

export type UpstreamNode = { node: string; kind: string };

/**
 * Directed causal graph of supply-chain relationships:
 *
 *   event --affects--> location --manufactures_at--> supplier --supplies--> company
 *
 * Loosely coupled to the event store: events are attached by label only.
 */
export class SupplyGraph {
  private readonly graph = new Graph<NodeAttrs, EdgeAttrs>({
    type: "directed",
    multi: false,
    allowSelfLoops: false,
  });

  constructor(private readonly edges?: EdgeStore) {}

  /** Company nodes keep their kind even if also named as a supplier. */
  private ensureNode(key: string, kind: NodeAttrs["kind"]) {
    if (!this.graph.hasNode(key)) {
      this.graph.addNode(key, { kind });
      return;
    }
    if (this.graph.getNodeAttribute(key, "kind") !== "company") {
      this.graph.setNodeAttribute(key, "kind", kind);
    }
  }

  private ensureEdge(source: string, target: string, relation: string) {
    if (source === target) return;
    this.graph.mergeEdge(source, target, { relation, confidence: 1.0 });
  }

  /** Idempotent: re-adding identical topology leaves the graph unchanged. */
  addStaticTopology(companies: Company[]): void {
    for (const company of companies) {
      this.ensureNode(company.name, "company");
      for (const node of company.nodes) {
        this.ensureNode(node.entity, "supplier");
        this.ensureNode(node.location, "location");
        this.ensureEdge(node.location, node.entity, "manufactures_at");
        this.ensureEdge(node.entity, company.name, "supplies");
      }
    }
    log.info("[GRAPH] topology", this.stats());
  }

  addEvent(label: string, location: string, kind = "event", severity?: Severity): void {
    if (!this.graph.hasNode(location)) this.ensureNode(location, "location");
    if (this.graph.hasNode(label)) {
      this.graph.mergeNodeAttributes(label, severity ? { kind, severity } : { kind });
    } else {
      this.graph.addNode(label, severity ? { kind, severity } : { kind });
    }
    this.ensureEdge(label, location, "affects");
  }

  private walk(start: string, next: (n: string) => string[]): Set<string> {
    const seen = new Set<string>();
    if (!this.graph.hasNode(start)) return seen;
    const queue = [start];
    while (queue.length) {
      const cur = queue.shift();
      if (cur === undefined) break;
      for (const n of next(cur)) {
        if (n === start || seen.has(n)) continue;
        seen.add(n);
        queue.push(n);
      }
    }
    return seen;
  }

  /** Companies exposed to something happening at `location`. */
  reachableCompaniesFrom(location: string): string[] {
    const reached = this.walk(location, (n) => this.graph.outNeighbors(n));
    return [...reached].filter(
      (n) => this.graph.getNodeAttribute(n, "kind") === "company"
    );
  }

  /** Suppliers, locations and attached events upstream of `company`. */
  upstreamOf(company: string): UpstreamNode[] {
    const reached = this.walk(company, (n) => this.graph.inNeighbors(n));
    return [...reached].map((node) => ({
      node,
      kind: this.graph.getNodeAttribute(node, "kind"),
    }));
  }

  /** Edges whose endpoints both lie in `company` or its upstream. */
  edgesFor(company: string): GraphEdgeRecord[] {
    if (!this.graph.hasNode(company)) return [];
    const scope = new Set([company, ...this.upstreamOf(company).map((u) => u.node)]);
    const out: GraphEdgeRecord[] = [];
    this.graph.forEachEdge((_edge, attrs, source, target) => {
      if (scope.has(source) && scope.has(target)) {
        out.push({
          source,
          target,
          relation: attrs.relation,
          company,
          confidence: attrs.confidence,
        });
      }
    });
    return out;
  }

  /** Upsert `company`'s edges; returns how many were newly written. */
  persist(company: string): number {
    if (!this.edges) throw new Error("SupplyGraph has no edge store to persist to");
    const written = this.edges.upsertMany(this.edgesFor(company));
    if (written) log.info("[GRAPH] persisted edges", { company, written });
    return written;
  }

  kindOf(key: string): string | undefined {
    return this.graph.hasNode(key) ? this.graph.getNodeAttribute(key, "kind") : undefined;
  }

  stats(): { nodes: number; edges: number } {
    return { nodes: this.graph.order, edges: this.graph.size };
  }
}
