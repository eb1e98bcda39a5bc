import { InvalidPointsError } from "../../common/errors";
import { Account, AccountsRepository } from "./repository";

export class AccountLedger {
  constructor(
    private readonly accountsRepo: AccountsRepository,
    private readonly pointsPerDollar: number = 1.0
  ) {
    if (!Number.isFinite(pointsPerDollar) || pointsPerDollar < 0) {
      throw new InvalidPointsError("Points per dollar must be a non-negative number");
    }
  }

  // Amounts are scaled to whole cents first: 0.29 * 100 is 28.999... in binary
  pointsFor(amount: number): number {
    const cents = Math.round(amount * 100);
    return Math.floor((cents * this.pointsPerDollar) / 100);
  }

  lookup(accountIdentifier: string): Promise<Account | null> {
    return this.accountsRepo.getById(accountIdentifier);
  }

  /**
   * Adds points to a member's balance and persists it.
   * Returns the new balance, or null when the identifier is not a member.
   */
  async accrue(accountIdentifier: string, points: number): Promise<number | null> {
    if (!Number.isSafeInteger(points) || points < 0) {
      throw new InvalidPointsError();
    }

    const account = await this.accountsRepo.getById(accountIdentifier);
    if (!account) {
      return null;
    }

    const pointsBalance = account.pointsBalance + points;
    if (!Number.isSafeInteger(pointsBalance)) {
      throw new InvalidPointsError(`Balance for ${accountIdentifier} would exceed the safe integer range`);
    }

    const updated = await this.accountsRepo.save({ ...account, pointsBalance });
    return updated.pointsBalance;
  }

  summary(): Promise<Account[]> {
    return this.accountsRepo.list();
  }
}
