/*
 * Plan Node Flags
 * ---------------
 * Compact bit flags stored in PlanNode.flags so the executor can branch on
 * a node's shape without re-reading its dependant.
 *
 * Layout:
 *   Bit 0: Value is cached in its scope (dependant.shared)
 *   Bit 1: Node has no parameters
 */

/** Value is cached and reused within its scope; decides caching and pruning. */
export const NODE_SHARED = 1 << 0;

/** Node has no parameters; its factory is called without arguments. */
export const NODE_LEAF = 1 << 1;
