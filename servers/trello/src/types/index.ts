/**
 * Type definitions for the Trello triage MCP server
 */

export type CriticalityLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export const CRITICALITY_LEVELS: readonly CriticalityLevel[] = ['HIGH', 'MEDIUM', 'LOW'];

export function isCriticalityLevel(value: string): value is CriticalityLevel {
  return CRITICALITY_LEVELS.some((level) => level === value);
}

export interface CardLabel {
  name: string;
  color: string | null;
}

/**
 * A tracked work-item, immutable for the duration of one analysis pass.
 * `id` is the only key used to reconcile LLM output with input cards.
 */
export interface Card {
  id: string;
  title: string;
  description: string;
  due: string | null;
  listName: string;
  labels: CardLabel[];
  members: string[];
  boardId: string;
  boardName: string;
  url: string;
}

// ============================================
// Trello REST payloads
// ============================================

export interface TrelloLabel {
  id: string;
  name: string;
  color: string | null;
  idBoard?: string;
}

export interface TrelloMember {
  id: string;
  fullName?: string;
  username?: string;
}

export interface TrelloCard {
  id: string;
  name: string;
  desc?: string;
  due?: string | null;
  url: string;
  idList?: string;
  idBoard?: string;
  labels?: TrelloLabel[];
  members?: TrelloMember[];
  board?: { id: string; name: string };
  list?: { id: string; name: string };
}

export interface TrelloList {
  id: string;
  name: string;
  idBoard: string;
}

export interface TrelloBoard {
  id: string;
  name: string;
  url?: string;
}
