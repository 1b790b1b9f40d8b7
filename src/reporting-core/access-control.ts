import type { Principal } from '@shared/types';
import { AuthorizationError, ValidationError } from './errors';
import type { CallerContext } from './report-context';
import type { LedgerState, LedgerTransaction } from './store';

/** Empty, blank, or an all-zero address such as `0x000…0`. */
export function isNullPrincipal(principal: Principal): boolean {
  const trimmed = principal.trim();
  return trimmed.length === 0 || /^0x0+$/i.test(trimmed);
}

export function requireAuthority(state: Readonly<LedgerState>, ctx: CallerContext): void {
  if (ctx.caller !== state.authority) {
    throw new AuthorizationError('Only authority can perform this action');
  }
}

export function isAuthorized(state: Readonly<LedgerState>, principal: Principal): boolean {
  return state.investigators.has(principal);
}

export function addInvestigator(tx: LedgerTransaction, ctx: CallerContext, investigator: Principal): void {
  requireAuthority(tx.state, ctx);
  if (isNullPrincipal(investigator)) {
    throw new ValidationError('Invalid investigator address');
  }
  if (tx.state.investigators.has(investigator)) {
    throw new ValidationError(`Investigator ${investigator} already authorized`);
  }
  tx.state.investigators.add(investigator);
  tx.emit('InvestigatorAdded', null, { investigator });
}

export function removeInvestigator(tx: LedgerTransaction, ctx: CallerContext, investigator: Principal): void {
  requireAuthority(tx.state, ctx);
  if (!tx.state.investigators.has(investigator)) {
    throw new ValidationError(`Investigator ${investigator} is not authorized`);
  }
  tx.state.investigators.delete(investigator);
  tx.emit('InvestigatorRemoved', null, { investigator });
}

export function transferAuthority(tx: LedgerTransaction, ctx: CallerContext, newAuthority: Principal): void {
  requireAuthority(tx.state, ctx);
  if (isNullPrincipal(newAuthority)) {
    throw new ValidationError('Invalid authority address');
  }
  const previous = tx.state.authority;
  tx.state.authority = newAuthority;
  tx.emit('AuthorityTransferred', null, { previous, authority: newAuthority });
}
