/**
 * Streaming-friendly wrapper around the simulator for key text that arrives
 * in arbitrary chunks (a terminal, a network stream).
 */

import type { ReplayStep } from "./vim-types";
import { extractKeystroke } from "./vim-keys";
import { VimSimulator } from "./vim-simulator";
import type { SimulatorOptions } from "./vim-options";

export class StreamingVimSimulator {
  private simulator: VimSimulator;
  private rawInput = "";
  private processedIndex = 0;

  constructor(
    private readonly startText: string,
    private readonly options?: Partial<SimulatorOptions>
  ) {
    this.simulator = new VimSimulator(startText, options);
  }

  // Add new text from the stream; returns the steps for keys it completed
  appendTokens(chunk: string): ReplayStep[] {
    this.rawInput += chunk;
    return this.processNewKeystrokes();
  }

  private processNewKeystrokes(): ReplayStep[] {
    const newSteps: ReplayStep[] = [];

    while (this.processedIndex < this.rawInput.length) {
      const remaining = this.rawInput.slice(this.processedIndex);
      // null: the chunk ended inside a key name like `<Es`; wait for more
      const next = extractKeystroke(remaining);
      if (!next) break;

      newSteps.push(this.simulator.executeKey(next.token));
      this.processedIndex += next.length;
    }

    return newSteps;
  }

  getSimulator(): VimSimulator {
    return this.simulator;
  }

  getSteps(): ReplayStep[] {
    return this.simulator.getSteps();
  }

  getText(): string {
    return this.simulator.getText();
  }

  getRawKeystrokes(): string {
    return this.rawInput;
  }

  getProcessedKeystrokes(): string {
    return this.rawInput.slice(0, this.processedIndex);
  }

  reset(): void {
    this.simulator = new VimSimulator(this.startText, this.options);
    this.rawInput = "";
    this.processedIndex = 0;
  }
}
