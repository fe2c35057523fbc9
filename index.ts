/**
 * Authority-aware unified knowledge graph
 *
 * One graph over chunks, decisions, questions, assessments, roadmap items
 * and gaps, with a fixed authority hierarchy:
 * - typed, weighted edges held in adjacency maps
 * - idempotent sync from the artifact stores
 * - similarity-inferred SUPPORTED_BY, MENTIONED_IN and OVERRIDES edges
 * - authority-ordered retrieval and multi-hop traversal
 */

export * from "./src/index.js";
