import { Account, AccountsRepository } from "../../modules/accounts/repository";

export const SEED_ACCOUNTS: readonly Account[] = [
  { displayName: "John Doe", accountIdentifier: "1234567890123456", pointsBalance: 100 },
  { displayName: "Jane Smith", accountIdentifier: "2345678901234567", pointsBalance: 250 },
  { displayName: "Bob Johnson", accountIdentifier: "3456789012345678", pointsBalance: 50 }
];

// Non-durable: balances live for the lifetime of the process only
export class MemoryAccountsRepository implements AccountsRepository {
  private readonly accounts: Map<string, Account>;

  constructor(seed: readonly Account[] = SEED_ACCOUNTS) {
    this.accounts = new Map(
      seed.map((account): [string, Account] => [account.accountIdentifier, { ...account }])
    );
  }

  async getById(accountIdentifier: string): Promise<Account | null> {
    const account = this.accounts.get(accountIdentifier);
    return account ? { ...account } : null;
  }

  async save(account: Account): Promise<Account> {
    const stored: Account = { ...account };
    this.accounts.set(stored.accountIdentifier, stored);
    return { ...stored };
  }

  async list(): Promise<Account[]> {
    return Array.from(this.accounts.values(), (account) => ({ ...account }));
  }
}
