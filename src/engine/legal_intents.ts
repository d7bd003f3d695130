import type { IntentType } from '../schema';
import type { MatchState } from '../types';
import type { DiceRoll } from './dice';

/**
 * 列出当前玩家此刻可以提交、且按当前状态会被接受的意图。
 * 顺序固定：move（用给定的骰子）→ purchase → accept/reject 或 trade 报价 → attack。
 */
export function legal_intents(match: MatchState, roll: DiceRoll): IntentType[] {
  const modules = match.modules;
  if (match.phase !== 'awaiting_intent' || !modules) return [];

  const { roster } = match;
  const player = match.current_player;
  if (!roster.is_active(player)) return [];
  const me = roster.get(player);
  const out: IntentType[] = [];

  out.push({ kind: 'move', player, spaces: roll.total, dice: [...roll.faces] });

  const property = modules.property;
  const currency = modules.currency;
  if (property && currency) {
    const here = property.get(me.position);
    if (here && here.owner === null && currency.can_afford(player, here.price)) {
      out.push({ kind: 'purchase', player, position: here.position });
    }

    if (match.rules.property_tradable) {
      const offer = property.pending_offer();
      if (offer) {
        // 只有应答方有事可做：成交条件仍满足时可以接受，任何时候都可以拒绝
        const answering = offer.proposer === offer.from_player ? offer.to_player : offer.from_player;
        if (answering === player) {
          const record = property.get(offer.position);
          const settles =
            record?.owner === offer.from_player &&
            roster.is_active(offer.to_player) &&
            currency.can_afford(offer.to_player, offer.price);
          if (settles) out.push({ kind: 'accept', player, offer_id: offer.id });
          out.push({ kind: 'reject', player, offer_id: offer.id });
        }
      } else {
        // 以标价向其他存活玩家发出收购报价；成交要等对方接受
        for (const r of property.all()) {
          if (r.owner === null || r.owner === player || !roster.is_active(r.owner)) continue;
          if (!currency.can_afford(player, r.price)) continue;
          out.push({ kind: 'trade', player, from_player: r.owner, to_player: player, position: r.position, price: r.price });
        }
      }
    }
  }

  if (modules.combat) {
    for (const p of roster.active_players()) {
      if (p.id !== player) out.push({ kind: 'attack', player, target: p.id });
    }
  }

  return out;
}
