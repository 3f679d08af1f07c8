import { Address, getAddress } from "viem";
import { checkedAdd } from "../accounting/FixedPoint";
import { InsufficientBalanceError, InvalidArgumentError } from "../errors";

/// invoked before balances move; may call back into whoever issued the transfer
export type TransferHook = (
  from: Address,
  to: Address,
  amount: bigint
) => void;

/**
 * Token balances as the distributors see them.
 *
 * A transfer is the only point where control can leave the distributor, so
 * every distributor commits its own state before issuing one.
 */
export abstract class BaseTokenVault {
  abstract balanceOf(token: Address, account: Address): bigint;

  /**
   * Moves `amount` of `token`; throws `InsufficientBalanceError` when `from` holds less
   */
  abstract transfer(
    token: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): void;

  /**
   * Captures every balance
   * @returns a function putting the captured balances back
   */
  abstract checkpoint(): () => void;
}

export class InMemoryTokenVault extends BaseTokenVault {
  private _balances = new Map<Address, Map<Address, bigint>>();
  private readonly _hooks = new Map<Address, TransferHook>();

  balanceOf(token: Address, account: Address): bigint {
    return (
      this._balances.get(getAddress(token))?.get(getAddress(account)) ?? 0n
    );
  }

  mint(token: Address, account: Address, amount: bigint) {
    if (amount < 0n) {
      throw new InvalidArgumentError(`Cannot mint negative amount ${amount}`);
    }
    this.setBalance(
      token,
      account,
      checkedAdd(this.balanceOf(token, account), amount)
    );
  }

  /**
   * Installs a hook run on every transfer of `token`, or removes it
   */
  setTransferHook(token: Address, hook?: TransferHook) {
    if (hook) {
      this._hooks.set(getAddress(token), hook);
    } else {
      this._hooks.delete(getAddress(token));
    }
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint) {
    if (amount < 0n) {
      throw new InvalidArgumentError(
        `Cannot transfer negative amount ${amount}`
      );
    }
    this._hooks.get(getAddress(token))?.(from, to, amount);

    const available = this.balanceOf(token, from);
    if (available < amount) {
      throw new InsufficientBalanceError(token, amount, available);
    }
    this.setBalance(token, from, available - amount);
    this.setBalance(
      token,
      to,
      checkedAdd(this.balanceOf(token, to), amount)
    );
  }

  checkpoint(): () => void {
    const saved = new Map(
      [...this._balances].map(
        ([token, balances]): [Address, Map<Address, bigint>] => [
          token,
          new Map(balances),
        ]
      )
    );
    return () => {
      this._balances = saved;
    };
  }

  private setBalance(token: Address, account: Address, amount: bigint) {
    const key = getAddress(token);
    let balances = this._balances.get(key);
    if (!balances) {
      balances = new Map();
      this._balances.set(key, balances);
    }
    balances.set(getAddress(account), amount);
  }
}
