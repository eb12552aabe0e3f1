import { CloudInitGenerator } from './cloud-init-generator';
import { DnsInstructionsGenerator } from './dns-instructions-generator';
import { TemplateContexts, TemplateFormat, TemplateGenerator } from './types';

/** DigitalOcean rejects user data above 64 KiB */
export const MAX_USER_DATA_BYTES = 64 * 1024;

export type TemplateGenerators = {
  [K in TemplateFormat]: TemplateGenerator<TemplateContexts[K]>;
};

export interface TemplateOptions {
  validate?: boolean;
}

export class TemplateEngine {
  private readonly generators: TemplateGenerators;

  constructor(generators: Partial<TemplateGenerators> = {}) {
    this.generators = {
      'cloud-init': generators['cloud-init'] ?? new CloudInitGenerator(),
      'dns-instructions': generators['dns-instructions'] ?? new DnsInstructionsGenerator()
    };
  }

  generate<K extends TemplateFormat>(
    format: K,
    context: TemplateContexts[K],
    options: TemplateOptions = {}
  ): string {
    const generator: TemplateGenerator<TemplateContexts[K]> = this.generators[format];
    const template = generator.generate(context);

    if (options.validate) {
      this.validateTemplate(format, template);
    }
    return template;
  }

  registerGenerator<K extends TemplateFormat>(format: K, generator: TemplateGenerators[K]): void {
    this.generators[format] = generator;
  }

  getSupportedFormats(): TemplateFormat[] {
    return Object.keys(this.generators).filter(isTemplateFormat);
  }

  validateTemplate(format: TemplateFormat, template: string): void {
    if (format !== 'cloud-init') {
      return;
    }
    if (!template.startsWith('#!')) {
      throw new Error('Cloud-init script must start with an interpreter line');
    }
    const size = Buffer.byteLength(template, 'utf8');
    if (size > MAX_USER_DATA_BYTES) {
      throw new Error(`Cloud-init script is ${size} bytes, above the ${MAX_USER_DATA_BYTES} byte limit`);
    }
  }
}

function isTemplateFormat(value: string): value is TemplateFormat {
  return value === 'cloud-init' || value === 'dns-instructions';
}
