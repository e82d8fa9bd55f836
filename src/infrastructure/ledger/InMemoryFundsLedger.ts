import { normalizeAddress } from '../../kernel-core/L0/Primitives.js';
import type { FundsLedger } from '../../kernel-core/L0/Ports.js';
import type { Address, Amount } from '../../kernel-core/L0/Ontology.js';
import { InsufficientAllowanceError, InsufficientBalanceError } from '../../Platform/Errors.js';

/**
 * Single-token ledger held in memory. The escrow's custody account is debited by
 * `push` and credited by `pull`; owners approve the escrow before it can pull.
 */
export class InMemoryFundsLedger implements FundsLedger {
    private balances: Map<Address, Amount> = new Map();
    private allowances: Map<Address, Amount> = new Map();
    public readonly escrowAccount: Address;

    constructor(escrowAccount: Address) {
        this.escrowAccount = normalizeAddress(escrowAccount);
    }

    public balanceOf(account: Address): Amount {
        return this.balances.get(normalizeAddress(account)) ?? 0n;
    }

    public allowanceOf(owner: Address): Amount {
        return this.allowances.get(normalizeAddress(owner)) ?? 0n;
    }

    public mint(account: Address, amount: Amount): void {
        this.credit(normalizeAddress(account), amount);
    }

    public approve(owner: Address, amount: Amount): void {
        this.allowances.set(normalizeAddress(owner), amount);
    }

    public pull(from: Address, amount: Amount): void {
        const owner = normalizeAddress(from);
        const allowance = this.allowanceOf(owner);
        if (allowance < amount) throw new InsufficientAllowanceError(owner, allowance, amount);

        this.debit(owner, amount);
        this.allowances.set(owner, allowance - amount);
        this.credit(this.escrowAccount, amount);
    }

    public push(to: Address, amount: Amount): void {
        this.debit(this.escrowAccount, amount);
        this.credit(normalizeAddress(to), amount);
    }

    public transaction<T>(work: () => T): T {
        const balances = new Map(this.balances);
        const allowances = new Map(this.allowances);
        try {
            return work();
        } catch (e) {
            this.balances = balances;
            this.allowances = allowances;
            throw e;
        }
    }

    private debit(account: Address, amount: Amount): void {
        const balance = this.balanceOf(account);
        if (balance < amount) throw new InsufficientBalanceError(account, balance, amount);
        this.balances.set(account, balance - amount);
    }

    private credit(account: Address, amount: Amount): void {
        this.balances.set(account, this.balanceOf(account) + amount);
    }
}
