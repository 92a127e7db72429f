/**
 * Job Module Registry
 *
 * Job modules each contribute part of a job's XML. The registry applies them
 * to a job root in ascending `sequence` order.
 *
 * @module translators/module-registry
 */

import { XmlElement } from '../xml/element.js';

/**
 * Parsed job definition
 */
export type JobDefinition = Record<string, unknown>;

/**
 * A unit that writes its part of a job definition into the job XML
 */
export interface JobModule {
  /** Ordering key; lower runs first */
  readonly sequence: number;
  /** Display name used in diagnostics */
  readonly name: string;
  genXml(xmlParent: XmlElement, data: JobDefinition): void;
}

/** Root element of a freestyle job */
export const PROJECT_ROOT_TAG = 'project';

export class ModuleRegistry {
  private readonly modules: JobModule[] = [];

  constructor(modules: JobModule[] = []) {
    for (const module of modules) {
      this.register(module);
    }
  }

  register(module: JobModule): this {
    this.modules.push(module);
    // Stable sort keeps registration order among equal sequences
    this.modules.sort((a, b) => a.sequence - b.sequence);
    return this;
  }

  /**
   * Registered modules in the order they run
   */
  list(): readonly JobModule[] {
    return this.modules;
  }

  /**
   * Apply every module to an existing job root
   */
  apply(xmlParent: XmlElement, data: JobDefinition): XmlElement {
    for (const module of this.modules) {
      module.genXml(xmlParent, data);
    }
    return xmlParent;
  }

  /**
   * Build a job's XML from a fresh root
   */
  generateJobXml(data: JobDefinition): XmlElement {
    return this.apply(new XmlElement(PROJECT_ROOT_TAG), data);
  }
}
