/**
 * AST Traversal
 *
 * Visitor pattern and utility functions for walking and querying node trees.
 * Parent links are kept by the containers, so upward queries need no root.
 */

import { isBlockKind, isSpanKind, TextKind, type NodeKind, type Payload } from './ast-types.js';
import { ContainerNode, TextNode, type AstNode } from './ast-nodes.js';
import { decodeEntityPayload } from './entities.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * Visitor with optional methods per node family. The most specific method
 * defined is called; visitNode catches everything else.
 */
export interface Visitor {
  visitNode?(node: AstNode, parent: ContainerNode | null): VisitResult | void;
  visitBlock?(node: AstNode, parent: ContainerNode | null): VisitResult | void;
  visitSpan?(node: ContainerNode, parent: ContainerNode | null): VisitResult | void;
  visitText?(node: TextNode, parent: ContainerNode | null): VisitResult | void;
}

/**
 * Walk a tree top-down
 */
export function walkTree(root: AstNode, visitor: Visitor): void {
  walkTopDown(root, visitor);
}

/**
 * Walk a tree bottom-up (children first, then parent)
 */
export function walkTreeBottomUp(root: AstNode, visitor: Visitor): void {
  walkBottomUp(root, visitor);
}

function walkTopDown(node: AstNode, visitor: Visitor): VisitResult {
  const result = callVisitor(node, visitor);
  if (result === VisitResult.Stop) return VisitResult.Stop;
  if (result === VisitResult.Skip) return VisitResult.Continue;

  if (node instanceof ContainerNode) {
    for (const child of node.children) {
      if (walkTopDown(child, visitor) === VisitResult.Stop) return VisitResult.Stop;
    }
  }
  return VisitResult.Continue;
}

function walkBottomUp(node: AstNode, visitor: Visitor): VisitResult {
  if (node instanceof ContainerNode) {
    for (const child of node.children) {
      if (walkBottomUp(child, visitor) === VisitResult.Stop) return VisitResult.Stop;
    }
  }
  return callVisitor(node, visitor);
}

function callVisitor(node: AstNode, visitor: Visitor): VisitResult {
  const parent = node.parent;
  let result: VisitResult | void = undefined;
  if (node instanceof TextNode && visitor.visitText) {
    result = visitor.visitText(node, parent);
  } else if (isSpanKind(node.kind) && node instanceof ContainerNode && visitor.visitSpan) {
    result = visitor.visitSpan(node, parent);
  } else if (isBlockKind(node.kind) && visitor.visitBlock) {
    result = visitor.visitBlock(node, parent);
  } else if (visitor.visitNode) {
    result = visitor.visitNode(node, parent);
  }
  return result ?? VisitResult.Continue;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * All nodes below `node`, in document order
 */
export function getDescendants(node: AstNode): AstNode[] {
  const descendants: AstNode[] = [];
  walkTree(node, {
    visitNode(visited) {
      if (visited !== node) descendants.push(visited);
    }
  });
  return descendants;
}

/**
 * Nodes of the given kind at or below `root`, in document order
 */
export function findNodes(root: AstNode, kind: NodeKind): AstNode[] {
  const found: AstNode[] = [];
  walkTree(root, {
    visitNode(node) {
      if (node.kind === kind) found.push(node);
    }
  });
  return found;
}

/**
 * Ancestors of a node, nearest first
 */
export function getAncestors(node: AstNode): ContainerNode[] {
  const ancestors: ContainerNode[] = [];
  for (let current = node.parent; current; current = current.parent) {
    ancestors.push(current);
  }
  return ancestors;
}

/**
 * Path from the tree's root down to the node, both included
 */
export function getNodePath(node: AstNode): AstNode[] {
  const path: AstNode[] = getAncestors(node).reverse();
  path.push(node);
  return path;
}

export function isAncestor(ancestor: AstNode, descendant: AstNode): boolean {
  return getAncestors(descendant).some(node => node === ancestor);
}

/**
 * Other children of the node's parent
 */
export function getSiblings(node: AstNode): AstNode[] {
  return node.parent?.children.filter(child => child !== node) ?? [];
}

export function getNextSibling(node: AstNode): AstNode | undefined {
  const siblings = node.parent?.children ?? [];
  const index = siblings.indexOf(node);
  return index >= 0 ? siblings[index + 1] : undefined;
}

export function getPreviousSibling(node: AstNode): AstNode | undefined {
  const siblings = node.parent?.children ?? [];
  const index = siblings.indexOf(node);
  return index > 0 ? siblings[index - 1] : undefined;
}

/**
 * Plain text of a subtree: entity references decoded, null chars and decoded
 * NULs as U+FFFD, both kinds of line break as a newline. Raw HTML is kept
 * as written and byte payloads are decoded as UTF-8.
 */
export function getTextContent(node: AstNode): string {
  const decoder = new TextDecoder();
  const asString = (payload: Payload) => typeof payload === 'string' ? payload : decoder.decode(payload);
  let content = '';
  walkTree(node, {
    visitText(text) {
      switch (text.kind) {
        case TextKind.NullChar:
          content += '\uFFFD';
          break;
        case TextKind.LineBreak:
        case TextKind.SoftLineBreak:
          content += '\n';
          break;
        case TextKind.Entity:
          content += decodeEntityPayload(text.text) ?? asString(text.text);
          break;
        default:
          content += asString(text.text);
      }
    }
  });
  return content;
}
