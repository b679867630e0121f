import { randomUUID } from 'node:crypto'

import type {
  BranchError,
  BranchInfo,
  BranchResult,
  Conversation,
  ConversationMeta,
  ConversationNode,
  ConversationRecord,
  LegacyConversation,
  Message,
  Variant
} from './types.js'

function ok<T>(value: T): BranchResult<T> {
  return { ok: true, value }
}

function fail<T>(error: BranchError): BranchResult<T> {
  return { ok: false, error }
}

function activeVariant(node: ConversationNode): Variant {
  return node.variants[node.activeVariantIndex] ?? node.variants[0]
}

function withNode(conversation: Conversation, node: ConversationNode): Conversation {
  return { ...conversation, nodes: { ...conversation.nodes, [node.id]: node } }
}

function metaOf(record: ConversationMeta): ConversationMeta {
  return { id: record.id, title: record.title, systemPrompt: record.systemPrompt, groupId: record.groupId }
}

export function createConversation(meta: Partial<ConversationMeta> & { id: string }): Conversation {
  return {
    id: meta.id,
    title: meta.title ?? '',
    systemPrompt: meta.systemPrompt ?? '',
    groupId: meta.groupId ?? null,
    rootNodeId: null,
    nodes: {}
  }
}

export function isBranching(record: ConversationRecord): record is Conversation {
  return 'nodes' in record
}

/**
 * Converts a flat history into a tree where every node has exactly one
 * variant, in the original order. Node ids derive from message ids, so the
 * result is deterministic. Already-branching input is returned unchanged.
 */
export function migrate(record: ConversationRecord): Conversation {
  if (isBranching(record)) return record

  const legacy: LegacyConversation = record
  const ids: string[] = []
  const used = new Set<string>()
  legacy.messages.forEach((message, index) => {
    let id = `node-${message.id}`
    for (let suffix = index; used.has(id); suffix += 1) id = `node-${message.id}-${suffix}`
    used.add(id)
    ids.push(id)
  })

  const nodes: Record<string, ConversationNode> = {}
  legacy.messages.forEach((message, index) => {
    nodes[ids[index]] = {
      id: ids[index],
      variants: [{ message, childNodeId: ids[index + 1] ?? null }],
      activeVariantIndex: 0
    }
  })

  return { ...metaOf(legacy), rootNodeId: ids[0] ?? null, nodes }
}

/** Nodes along the active path, root first. Stops at a dangling or repeated id. */
export function activePath(conversation: Conversation): ConversationNode[] {
  const path: ConversationNode[] = []
  const seen = new Set<string>()
  let nodeId = conversation.rootNodeId
  while (nodeId !== null && !seen.has(nodeId)) {
    const node = conversation.nodes[nodeId]
    if (!node) break
    seen.add(nodeId)
    path.push(node)
    nodeId = activeVariant(node).childNodeId
  }
  return path
}

/** The linear message list handed to a provider. */
export function flatten(conversation: Conversation): Message[] {
  return activePath(conversation).map((node) => activeVariant(node).message)
}

export function activeLeaf(conversation: Conversation): ConversationNode | null {
  const path = activePath(conversation)
  return path[path.length - 1] ?? null
}

/** Node whose active variant carries the message, or `null`. */
export function findNode(conversation: Conversation, messageId: string): string | null {
  for (const node of Object.values(conversation.nodes)) {
    if (activeVariant(node).message.id === messageId) return node.id
  }
  return null
}

function findOwningNode(conversation: Conversation, messageId: string): ConversationNode | null {
  for (const node of Object.values(conversation.nodes)) {
    if (node.variants.some((variant) => variant.message.id === messageId)) return node
  }
  return null
}

/**
 * Continues the active path with a new single-variant node.
 */
export function appendMessage(
  conversation: Conversation,
  message: Message,
  nodeId: string = randomUUID()
): { conversation: Conversation; nodeId: string } {
  const node: ConversationNode = { id: nodeId, variants: [{ message, childNodeId: null }], activeVariantIndex: 0 }
  const leaf = activeLeaf(conversation)

  if (!leaf) {
    return { conversation: { ...withNode(conversation, node), rootNodeId: nodeId }, nodeId }
  }

  const variants = leaf.variants.map((variant, index) =>
    index === leaf.activeVariantIndex ? { ...variant, childNodeId: nodeId } : variant
  )
  const linked = withNode(conversation, { ...leaf, variants })
  return { conversation: withNode(linked, node), nodeId }
}

/**
 * Adds `message` as a new, active variant of `nodeId`. Existing variants and
 * their subtrees stay untouched and addressable.
 */
export function createBranch(
  conversation: Conversation,
  nodeId: string,
  message: Message
): BranchResult<{ conversation: Conversation; nodeId: string }> {
  const node = conversation.nodes[nodeId]
  if (!node) return fail({ code: 'NodeNotFound', nodeId })

  const variants = [...node.variants, { message, childNodeId: null }]
  const updated: ConversationNode = { ...node, variants, activeVariantIndex: variants.length - 1 }
  return ok({ conversation: withNode(conversation, updated), nodeId })
}

export function switchVariant(
  conversation: Conversation,
  nodeId: string,
  variantIndex: number
): BranchResult<Conversation> {
  const node = conversation.nodes[nodeId]
  if (!node) return fail({ code: 'NodeNotFound', nodeId })
  if (!Number.isInteger(variantIndex) || variantIndex < 0 || variantIndex >= node.variants.length) {
    return fail({ code: 'IndexOutOfRange', nodeId, index: variantIndex, total: node.variants.length })
  }
  return ok(withNode(conversation, { ...node, activeVariantIndex: variantIndex }))
}

/**
 * Removes a message whose node is not a branch point. The node is spliced
 * out: whatever pointed at it now points at its continuation.
 */
export function deleteMessage(conversation: Conversation, messageId: string): BranchResult<Conversation> {
  const target = findOwningNode(conversation, messageId)
  if (!target) return fail({ code: 'Error', message: `Message not found: ${messageId}` })
  if (target.variants.length > 1) {
    return fail({ code: 'CannotDeleteBranchPoint', nodeId: target.id, messageId })
  }

  const continuation = target.variants[0].childNodeId
  const nodes: Record<string, ConversationNode> = {}
  for (const node of Object.values(conversation.nodes)) {
    if (node.id === target.id) continue
    const pointsAtTarget = node.variants.some((variant) => variant.childNodeId === target.id)
    nodes[node.id] = pointsAtTarget
      ? {
          ...node,
          variants: node.variants.map((variant) =>
            variant.childNodeId === target.id ? { ...variant, childNodeId: continuation } : variant
          )
        }
      : node
  }

  const rootNodeId = conversation.rootNodeId === target.id ? continuation : conversation.rootNodeId
  return ok({ ...conversation, rootNodeId, nodes })
}

export function getBranchInfo(conversation: Conversation, nodeId: string): BranchResult<BranchInfo> {
  const node = conversation.nodes[nodeId]
  if (!node) return fail({ code: 'NodeNotFound', nodeId })
  const total = node.variants.length
  const current = node.activeVariantIndex
  return ok({
    nodeId,
    currentVariantIndex: current,
    total,
    hasNext: current < total - 1,
    hasPrevious: current > 0
  })
}

/** Branch info for the node holding `messageId` in any of its variants. */
export function getBranchInfoForMessage(conversation: Conversation, messageId: string): BranchResult<BranchInfo> {
  const node = findOwningNode(conversation, messageId)
  if (!node) return fail({ code: 'MessageNotFound', messageId })
  return getBranchInfo(conversation, node.id)
}

export function describeBranchError(error: BranchError): string {
  switch (error.code) {
    case 'NodeNotFound':
      return `Node not found: ${error.nodeId}`
    case 'IndexOutOfRange':
      return `Variant index ${error.index} is out of range for node ${error.nodeId} (${error.total} variants)`
    case 'CannotDeleteBranchPoint':
      return `Message ${error.messageId} sits on a branch point and cannot be deleted`
    case 'MessageNotFound':
      return `Message not found: ${error.messageId}`
    case 'Error':
      return error.message
  }
}
