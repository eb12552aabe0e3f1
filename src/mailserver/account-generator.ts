import { randomInt } from 'crypto';
import { mailHostFor } from '../dns/dns-analyzer';
import { EmailAccount } from '../types';
import names from './names.json';

export const SECRET_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*';

export type RandomIndex = (upperBound: number) => number;

const cryptoIndex: RandomIndex = (upperBound) => randomInt(upperBound);

/**
 * Uniform selection from a fixed alphabet.
 */
export function generateSecret(
  length: number,
  alphabet: string = SECRET_ALPHABET,
  pick: RandomIndex = cryptoIndex
): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new Error(`Secret length must be a positive integer, got ${length}`);
  }
  let secret = '';
  for (let i = 0; i < length; i++) {
    secret += alphabet[pick(alphabet.length)];
  }
  return secret;
}

export interface AccountGeneratorOptions {
  secretLength?: number;
  submissionPort?: number;
  imapPort?: number;
  firstNames?: readonly string[];
  lastNames?: readonly string[];
  pick?: RandomIndex;
}

export class AccountGenerator {
  private readonly secretLength: number;
  private readonly submissionPort: number;
  private readonly imapPort: number;
  private readonly firstNames: readonly string[];
  private readonly lastNames: readonly string[];
  private readonly pick: RandomIndex;
  private readonly issued = new Set<string>();

  constructor(options: AccountGeneratorOptions = {}) {
    this.secretLength = options.secretLength ?? 16;
    this.submissionPort = options.submissionPort ?? 587;
    this.imapPort = options.imapPort ?? 993;
    this.firstNames = options.firstNames ?? names.first;
    this.lastNames = options.lastNames ?? names.last;
    this.pick = options.pick ?? cryptoIndex;
  }

  generate(domain: string, count: number): EmailAccount[] {
    const accounts: EmailAccount[] = [];
    for (let i = 0; i < count; i++) {
      accounts.push(this.generateOne(domain));
    }
    return accounts;
  }

  generateOne(domain: string): EmailAccount {
    const username = this.uniqueUsername(domain);
    const mailHost = mailHostFor(domain);

    return {
      address: `${username}@${domain}`,
      domain,
      username,
      secret: generateSecret(this.secretLength, SECRET_ALPHABET, this.pick),
      mailHost,
      submissionPort: this.submissionPort,
      imapPort: this.imapPort
    };
  }

  private uniqueUsername(domain: string): string {
    const first = this.firstNames[this.pick(this.firstNames.length)];
    const last = this.lastNames[this.pick(this.lastNames.length)];
    const base = `${first}.${last}`;

    let username = base;
    for (let suffix = 2; this.issued.has(`${username}@${domain}`); suffix++) {
      username = `${base}${suffix}`;
    }
    this.issued.add(`${username}@${domain}`);
    return username;
  }
}
