import { activeDashboardAccount } from '../flows/action.js'
import { isUpgradeAvailable } from '../flows/upgrade.js'
import { parseDashboard, type LedgerPage } from '../ledger/types.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage, type ListMessage, type ListRow, type TextMessage } from '../outbound.js'
import type { Session } from '../state/types.js'

export const MENU_COMMANDS = {
  viewLedger: 'view_ledger',
  refresh: 'refresh',
  acceptAll: 'accept_all'
} as const

export function renderMenu(messages: MessageRenderer, session: Session): ListMessage {
  const dashboard = parseDashboard(session.profileSnapshot)
  const account = activeDashboardAccount(session)
  const pendingIn = account?.pendingInData.length ?? 0
  const pendingOut = account?.pendingOutData.length ?? 0
  const balances = account?.balanceData?.securedNetBalancesByDenom.join(', ') ?? ''

  const rows: ListRow[] = [{ rowId: 'offer_credex', title: messages.render('menu_offer') }]
  if (pendingIn > 0) {
    rows.push(
      { rowId: 'accept_offers', title: messages.render('menu_accept') },
      { rowId: 'decline_offers', title: messages.render('menu_decline') },
      { rowId: MENU_COMMANDS.acceptAll, title: messages.render('menu_accept_all') }
    )
  }
  if (pendingOut > 0) {
    rows.push({ rowId: 'cancel_offers', title: messages.render('menu_cancel') })
  }
  rows.push({ rowId: MENU_COMMANDS.viewLedger, title: messages.render('menu_view_ledger') })
  if (isUpgradeAvailable(session)) {
    rows.push({ rowId: 'upgrade_tier', title: messages.render('menu_upgrade') })
  }
  rows.push({ rowId: MENU_COMMANDS.refresh, title: messages.render('menu_refresh') })

  return {
    type: 'list',
    body: messages.render('menu_body', {
      firstName: dashboard?.member.firstname ?? '',
      accountName: account?.accountName ?? session.activeAccount?.accountName ?? '',
      balances: balances || messages.render('menu_no_balance'),
      pendingIn,
      pendingOut
    }),
    buttonLabel: messages.render('menu_button_label'),
    sections: [{ title: messages.render('menu_section_title'), rows }]
  }
}

export function renderLedger(messages: MessageRenderer, accountName: string, page: LedgerPage): TextMessage {
  const lines = [messages.render('ledger_header', { accountName })]
  if (page.entries.length === 0) {
    lines.push(messages.render('ledger_empty'))
  }
  for (const entry of page.entries) {
    lines.push(messages.render('ledger_entry', {
      amount: entry.formattedInitialAmount,
      counterparty: entry.counterpartyAccountName
    }))
  }
  if (page.hasMore) {
    lines.push(messages.render('ledger_more'))
  }
  return textMessage(lines.join('\n'))
}
