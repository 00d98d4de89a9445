/**
 * Typed event definitions for structured run logging.
 */

import type { ReportMode } from '../issues/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  issueKey?: string;
  clusterKey?: string;
  reportId?: number;
  data?: Record<string, unknown>;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
}

// ── Run-level events ──

export interface RunStartedEvent {
  type: 'run-started';
  mode: ReportMode;
  statusesOnly: boolean;
}

export interface RunCompletedEvent {
  type: 'run-completed';
  eligible: number;
  reportsEmitted: number;
  linked: number;
  refreshed: number;
  duration: number;
}

export interface RunFailedEvent {
  type: 'run-failed';
  error: string;
  /** Set when the failure happened during emission. */
  reportsEmitted?: number;
  linked?: number;
  duration: number;
}

// ── Issue-level events ──

export interface ReportEmittedEvent {
  type: 'report-emitted';
  issueKey: string;
  reportId: number;
  clusterKey: string | null;
}

export interface ReportLinkedEvent {
  type: 'report-linked';
  issueKey: string;
  reportId: number;
  clusterKey: string;
}

export interface StatusRefreshedEvent {
  type: 'status-refreshed';
  issueKey: string;
  reportId: number;
  previousStatus: string | null;
  status: string;
}

export type RunEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | ReportEmittedEvent
  | ReportLinkedEvent
  | StatusRefreshedEvent;
