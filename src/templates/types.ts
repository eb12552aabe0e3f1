// Template-specific types
import { DatabaseCredentials, DnsHost, DomainAnalysis } from '../types';

export interface TemplateGenerator<TContext> {
  generate(context: TContext): string;
}

export interface CloudInitContext {
  database: DatabaseCredentials;
  sentinelPath: string;
  /** Extra apt packages on top of the mail stack */
  extraPackages?: readonly string[];
}

export interface DnsInstructionsContext {
  address: string;
  generatedAt: Date;
  analyses: ReadonlyArray<{ domain: string; analysis?: DomainAnalysis }>;
}

export interface TemplateContexts {
  'cloud-init': CloudInitContext;
  'dns-instructions': DnsInstructionsContext;
}

export type TemplateFormat = keyof TemplateContexts;

export type ProviderInstructions = Record<DnsHost, (domain: string) => string[]>;
