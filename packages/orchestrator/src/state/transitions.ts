import type { ConversationStatus } from '../contracts/index.js';
import { FatalError } from '../errors/index.js';

const ALLOWED: Record<ConversationStatus, readonly ConversationStatus[]> = {
  processing: ['awaiting_review', 'error'],
  awaiting_review: ['approved', 'rejected', 'processing'],
  approved: ['completed', 'error'],
  rejected: [],
  completed: [],
  error: ['approved', 'rejected', 'processing'],
};

export function canTransition(from: ConversationStatus, to: ConversationStatus): boolean {
  return from === to || ALLOWED[from].includes(to);
}

export function isTerminalStatus(status: ConversationStatus): boolean {
  return ALLOWED[status].length === 0;
}

export function assertTransition(from: ConversationStatus, to: ConversationStatus): void {
  if (!canTransition(from, to)) {
    throw new FatalError(`Illegal status transition ${from} -> ${to}`);
  }
}
