import type { EngineError, EventSink, OpResult, PropertyRecord, TradeOffer } from '../../types';
import { insufficient } from './currency';
import type { CurrencyLedger } from './currency';
import type { Roster } from './roster';

export interface PropertyOptions {
  purchasable: boolean;
  tradable: boolean;
  rent_collectible: boolean;
  bankruptcy_enabled: boolean;
}

/** 报价里除 proposer 之外的那一方 */
function counterparty(offer: TradeOffer): number {
  return offer.proposer === offer.from_player ? offer.to_player : offer.from_player;
}

function fail(code: EngineError['code'], message: string, details?: unknown): OpResult {
  return { ok: false, error: { code, message, details } };
}

/**
 * 地产登记处。每条记录的状态机：
 *   Unowned → Owned(A)（购买），Owned(A) → Owned(B)（交易），Owned(A) → Unowned（A 出局）
 *
 * 持有账本的单向引用（Property → Currency）。
 * 所有“先扣钱再改归属”的操作都保证：钱没扣成功就不碰归属。
 * PlayerState.owned_positions 与 owner 字段同步维护，二者必须始终一致。
 *
 * 玩家之间的交易分两步：一方 propose 生成报价，另一方 accept 才真正成交（或 reject 作废）。
 */
export class PropertyRegistry {
  private readonly records = new Map<number, PropertyRecord>();
  private offer: TradeOffer | null = null;
  private next_offer_id = 1;

  constructor(
    private readonly roster: Roster,
    private readonly ledger: CurrencyLedger,
    private readonly emit: EventSink,
    private readonly options: PropertyOptions,
    records: PropertyRecord[],
  ) {
    for (const r of [...records].sort((a, b) => a.position - b.position)) {
      this.records.set(r.position, { ...r });
    }
  }

  get(position: number): PropertyRecord | undefined {
    return this.records.get(position);
  }

  /** 按位置升序 */
  all(): PropertyRecord[] {
    return [...this.records.values()];
  }

  records_of(player_id: number): PropertyRecord[] {
    return this.all().filter((r) => r.owner === player_id);
  }

  /**
   * 玩家停在 position 上：
   * - 无记录：什么都不做
   * - 无主且允许购买：余额 ≥ 价格则自动买下，否则放弃（没有部分付款）
   * - 他人所有且收租：转账付租；付不起且允许破产 → 出局并释放全部地产
   * - 自己所有：无财务影响
   */
  land_on(player_id: number, position: number): void {
    const record = this.records.get(position);
    if (!record) return;

    if (record.owner === null) {
      if (!this.options.purchasable) return;
      if (this.ledger.can_afford(player_id, record.price)) {
        this.buy(player_id, record);
      } else {
        this.emit({
          type: 'purchase_declined',
          player_id,
          position,
          price: record.price,
          balance: this.ledger.balance(player_id),
        });
      }
      return;
    }

    if (record.owner === player_id) return;
    if (!this.options.rent_collectible || !this.roster.is_active(record.owner)) return;

    this.collect_rent(player_id, record, record.owner);
  }

  /** 显式购买（position 上的无主地产） */
  purchase(player_id: number, position: number): OpResult {
    if (!this.options.purchasable) {
      return fail('FEATURE_DISABLED', 'property purchase is disabled');
    }
    const record = this.records.get(position);
    if (!record) return fail('NO_PROPERTY', `no property at position ${position}`, { position });
    if (record.owner !== null) {
      return fail('ALREADY_OWNED', `property at ${position} is owned by player ${record.owner}`, {
        position,
        owner: record.owner,
      });
    }
    return this.buy(player_id, record);
  }

  /** 当前待答复的报价（拷贝） */
  pending_offer(): TradeOffer | null {
    return this.offer ? { ...this.offer } : null;
  }

  /**
   * 发起报价：proposer 必须是买卖双方之一，另一方即为应答方。
   * 检查顺序：交易开关 → 当事人 → 已有报价 → 地产 → 归属 → 对方 → 买方资金。
   * 报价本身不动钱也不动归属。
   */
  propose(proposer: number, seller_id: number, buyer_id: number, position: number, price: number): OpResult {
    if (!this.options.tradable) return fail('FEATURE_DISABLED', 'property trading is disabled');
    if (proposer !== seller_id && proposer !== buyer_id) {
      return fail('NOT_A_PARTY', `player ${proposer} is not a party to this trade`, {
        from_player: seller_id,
        to_player: buyer_id,
      });
    }
    if (this.offer) {
      return fail('TRADE_PENDING', `offer ${this.offer.id} is still waiting for an answer`, { offer_id: this.offer.id });
    }
    const record = this.records.get(position);
    if (!record) return fail('NO_PROPERTY', `no property at position ${position}`, { position });
    if (record.owner !== seller_id) {
      return fail('NOT_OWNER', `player ${seller_id} does not own property at ${position}`, {
        position,
        owner: record.owner,
      });
    }
    if (buyer_id === seller_id || !this.roster.is_active(buyer_id)) {
      return fail('INVALID_TARGET', `player ${buyer_id} cannot receive property at ${position}`, { buyer_id });
    }
    if (!this.ledger.can_afford(buyer_id, price)) {
      return { ok: false, error: insufficient(buyer_id, price, this.ledger.balance(buyer_id)) };
    }

    const id = this.next_offer_id++;
    this.offer = { id, proposer, from_player: seller_id, to_player: buyer_id, position, price };
    this.emit({ type: 'trade_proposed', offer_id: id, proposer, from_player: seller_id, to_player: buyer_id, position, price });
    return { ok: true };
  }

  /**
   * 应答方接受报价并成交。成交失败（归属或资金已变化）时报价保留，状态不变。
   */
  accept(player_id: number, offer_id: number): OpResult {
    const offer = this.find_offer(offer_id);
    if (!offer.ok) return offer;
    const { from_player, to_player, position, price } = offer.offer;
    if (player_id !== counterparty(offer.offer)) {
      return fail('NOT_A_PARTY', `only player ${counterparty(offer.offer)} can accept offer ${offer_id}`, { offer_id });
    }
    const r = this.trade(from_player, to_player, position, price);
    if (r.ok) this.offer = null;
    return r;
  }

  /** 应答方拒绝，或发起方撤回 */
  reject(player_id: number, offer_id: number): OpResult {
    const offer = this.find_offer(offer_id);
    if (!offer.ok) return offer;
    if (player_id !== offer.offer.proposer && player_id !== counterparty(offer.offer)) {
      return fail('NOT_A_PARTY', `player ${player_id} is not a party to offer ${offer_id}`, { offer_id });
    }
    this.offer = null;
    this.emit({ type: 'trade_rejected', offer_id, by: player_id });
    return { ok: true };
  }

  /**
   * 交易结算：buyer 付 price 给 seller，地产从 seller 转到 buyer。
   * 任一前置条件不满足或付款失败，归属与余额都保持原样。
   */
  trade(seller_id: number, buyer_id: number, position: number, price: number): OpResult {
    if (!this.options.tradable) return fail('FEATURE_DISABLED', 'property trading is disabled');
    const record = this.records.get(position);
    if (!record) return fail('NO_PROPERTY', `no property at position ${position}`, { position });
    if (record.owner !== seller_id) {
      return fail('NOT_OWNER', `player ${seller_id} does not own property at ${position}`, {
        position,
        owner: record.owner,
      });
    }
    if (buyer_id === seller_id || !this.roster.is_active(buyer_id)) {
      return fail('INVALID_TARGET', `player ${buyer_id} cannot receive property at ${position}`, { buyer_id });
    }

    const paid = this.ledger.transfer(buyer_id, seller_id, price);
    if (!paid.ok) return paid;

    this.set_owner(record, buyer_id);
    this.emit({
      type: 'property_traded',
      from_player: seller_id,
      to_player: buyer_id,
      position,
      price,
      from_balance: this.ledger.balance(seller_id),
      to_balance: this.ledger.balance(buyer_id),
    });
    return { ok: true };
  }

  /** 释放玩家名下全部地产；返回被释放的位置。涉及该玩家的报价一并作废 */
  release_all(player_id: number): number[] {
    if (this.offer && (this.offer.from_player === player_id || this.offer.to_player === player_id)) {
      this.emit({ type: 'trade_rejected', offer_id: this.offer.id, by: null });
      this.offer = null;
    }
    const released: number[] = [];
    for (const record of this.records_of(player_id)) {
      this.set_owner(record, null);
      released.push(record.position);
      this.emit({ type: 'property_released', position: record.position, previous_owner: player_id });
    }
    return released;
  }

  private find_offer(offer_id: number): { ok: true; offer: TradeOffer } | { ok: false; error: EngineError } {
    if (!this.offer || this.offer.id !== offer_id) {
      return { ok: false, error: { code: 'NO_OFFER', message: `no pending offer ${offer_id}`, details: { offer_id } } };
    }
    return { ok: true, offer: this.offer };
  }

  private buy(player_id: number, record: PropertyRecord): OpResult {
    const paid = this.ledger.debit(player_id, record.price);
    if (!paid.ok) return paid;
    this.set_owner(record, player_id);
    this.emit({
      type: 'property_purchased',
      player_id,
      position: record.position,
      price: record.price,
      balance: this.ledger.balance(player_id),
    });
    return { ok: true };
  }

  private collect_rent(player_id: number, record: PropertyRecord, owner_id: number): void {
    const amount = record.rent;
    const paid = this.ledger.transfer(player_id, owner_id, amount);
    if (paid.ok) {
      this.emit({
        type: 'rent_paid',
        player_id,
        owner_id,
        position: record.position,
        amount,
        balance: this.ledger.balance(player_id),
        owner_balance: this.ledger.balance(owner_id),
      });
      return;
    }

    const balance = this.ledger.balance(player_id);
    if (!this.options.bankruptcy_enabled) {
      this.emit({ type: 'rent_unpaid', player_id, owner_id, position: record.position, amount, balance });
      return;
    }

    // 破产：出局与释放地产在同一步完成
    this.emit({ type: 'player_bankrupt', player_id, owner_id, position: record.position, amount, balance });
    this.roster.deactivate(player_id);
    this.release_all(player_id);
    this.emit({ type: 'player_eliminated', player_id, cause: 'bankruptcy', by: owner_id });
  }

  private set_owner(record: PropertyRecord, owner: number | null): void {
    const previous = record.owner;
    if (previous !== null) {
      const p = this.roster.get(previous);
      p.owned_positions = p.owned_positions.filter((pos) => pos !== record.position);
    }
    record.owner = owner;
    if (owner !== null) {
      const p = this.roster.get(owner);
      p.owned_positions = [...p.owned_positions, record.position].sort((a, b) => a - b);
    }
  }
}
