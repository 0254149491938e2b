// src/core.ts
// Package-level logging: a lazily created default logger and free functions delegating to it.
// The default logger reads its settings from process.env and writes to stdout.

import type { Entry } from './entry';
import { sprint, sprintf } from './format';
import { Logger } from './logger';
import { Severity } from './types';
import type { Fields, Output, SpanContext } from './types';

/* ----------------------------- Default logger ------------------------------ */

let std: Logger | undefined;

/** The process-wide logger, created on first use. */
export function defaultLogger(): Logger {
    return (std ??= new Logger());
}

/** Set the destination of the default logger. */
export function setOutput(output: Output): void {
    defaultLogger().setOutput(output);
}

/** Set the project of the default logger. Used to qualify trace names. */
export function setProject(project: string): void {
    defaultLogger().setProject(project);
}

/** Include file, line and function in records of the default logger. */
export function setIncludeSources(include: boolean): void {
    defaultLogger().setIncludeSources(include);
}

/* --------------------------------- Entries --------------------------------- */

/** Create an empty entry of the default logger. */
export function newEntry(): Entry {
    return defaultLogger().newEntry();
}

export function withLabels(labels: Fields): Entry {
    return defaultLogger().newEntry().withLabels(labels);
}

export function withDetail(key: string, value: unknown): Entry {
    return defaultLogger().newEntry().withDetail(key, value);
}

export function withDetails(details: Fields): Entry {
    return defaultLogger().newEntry().withDetails(details);
}

export function withError(err: unknown): Entry {
    return defaultLogger().newEntry().withError(err);
}

export function withSpan(span: SpanContext): Entry {
    return defaultLogger().newEntry().withSpan(span);
}

export function withOperation(id: string, producer: string): Entry {
    return defaultLogger().newEntry().withOperation(id, producer);
}

/** Start an operation on a new entry and log its start at NOTICE. */
export function startOperation(id: string, producer: string): Entry {
    return defaultLogger().newEntry().beginOperation(id, producer, 2);
}

export function withStack(): Entry {
    return defaultLogger().newEntry().captureStack(1);
}

/* -------------------------------- Severities ------------------------------- */

// Each function calls emit directly: the source location is found by frame count.

export function debug(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Debug, sprint(args), 1);
}

export function debugf(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Debug, sprintf(format, args), 1);
}

export function info(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Info, sprint(args), 1);
}

export function infof(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Info, sprintf(format, args), 1);
}

export function notice(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Notice, sprint(args), 1);
}

export function noticef(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Notice, sprintf(format, args), 1);
}

export function warn(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Warning, sprint(args), 1);
}

export function warnf(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Warning, sprintf(format, args), 1);
}

export function error(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Error, sprint(args), 1);
}

export function errorf(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Error, sprintf(format, args), 1);
}

export function critical(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Critical, sprint(args), 1);
}

export function criticalf(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Critical, sprintf(format, args), 1);
}

export function alert(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Alert, sprint(args), 1);
}

export function alertf(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Alert, sprintf(format, args), 1);
}

export function emergency(...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Emergency, sprint(args), 1);
}

export function emergencyf(format: string, ...args: unknown[]): void {
    const l = defaultLogger();
    l.emit(l.newEntry(), Severity.Emergency, sprintf(format, args), 1);
}
