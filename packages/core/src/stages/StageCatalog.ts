/**
 * StageCatalog - maps a descriptor's tool tag to the stage variant that
 * implements it.
 */

import type { StageVariant } from '@bitforge/types';
import { FlowError } from '../errors/BitforgeError.js';
import { YosysStage } from './YosysStage.js';
import { IseStage } from './IseStage.js';
import { NextpnrStage } from './NextpnrStage.js';
import { IcepackStage } from './IcepackStage.js';

export class StageCatalog {
  private readonly variants = new Map<string, StageVariant>();

  constructor(variants: readonly StageVariant[] = []) {
    for (const variant of variants) {
      this.register(variant);
    }
  }

  register(variant: StageVariant): this {
    this.variants.set(variant.id, variant);
    return this;
  }

  has(toolId: string): boolean {
    return this.variants.has(toolId);
  }

  /**
   * @throws FlowError ERR_UNKNOWN_TOOL
   */
  get(toolId: string, flow?: string): StageVariant {
    const variant = this.variants.get(toolId);
    if (!variant) {
      throw new FlowError(`No stage variant registered for tool "${toolId}"`, 'ERR_UNKNOWN_TOOL', {
        flow,
        stage: toolId,
      });
    }
    return variant;
  }

  list(): StageVariant[] {
    return [...this.variants.values()];
  }
}

export function createDefaultCatalog(): StageCatalog {
  return new StageCatalog([new YosysStage(), new IseStage(), new NextpnrStage(), new IcepackStage()]);
}
