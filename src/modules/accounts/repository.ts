export type Account = {
  accountIdentifier: string;
  displayName: string;
  pointsBalance: number;
};

export interface AccountsRepository {
  getById(accountIdentifier: string): Promise<Account | null>;
  save(account: Account): Promise<Account>;
  list(): Promise<Account[]>;
}
