/**
 * Extension Move Strategy (Seiton)
 * 
 * Routes a new file to the rule's destination when its extension is listed.
 */

import type { SeitonRule } from '@sortwell/core';
import type { FileTransferResolver, TransferResult } from '../transfer/index.js';
import type { RealtimeStrategy } from './types.js';

export class ExtensionMoveStrategy implements RealtimeStrategy {
  private readonly extensions: ReadonlySet<string>;

  constructor(
    private readonly rule: SeitonRule,
    private readonly resolver: FileTransferResolver
  ) {
    this.extensions = new Set(
      rule.extensions.map((ext) => ext.replace(/^\./, '').toLowerCase())
    );
  }

  get name(): string {
    return this.rule.name;
  }

  get destination(): string {
    return this.rule.destination;
  }

  matches(extension: string): boolean {
    return this.extensions.has(extension.toLowerCase());
  }

  apply(filePath: string): Promise<TransferResult> {
    return this.resolver.move(filePath, this.rule.destination);
  }
}
