/**
 * Top-up Menu Commands
 * Numbered menu shown in the welcome and help messages. Each option number is also
 * a shortcut the classifier recognises on its own.
 *
 * @module commands
 */

import { COMMAND_TYPES, type MatchableCommandType } from './parsing';

export interface MenuCommand {
  option: number;
  commandType: MatchableCommandType;
  title: string;
  example: string;
}

/**
 * Menu options for the top-up assistant
 */
export const MENU_COMMANDS = [
  {
    option: 1,
    commandType: COMMAND_TYPES.AIRTIME_PURCHASE,
    title: 'Buy airtime',
    example: 'buy 1000 airtime for 08012345678',
  },
  {
    option: 2,
    commandType: COMMAND_TYPES.DATA_PURCHASE,
    title: 'Buy data',
    example: 'buy 2gb mtn',
  },
  {
    option: 3,
    commandType: COMMAND_TYPES.ELECTRICITY_PAYMENT,
    title: 'Pay electricity',
    example: 'pay 5000 electricity',
  },
  {
    option: 4,
    commandType: COMMAND_TYPES.BALANCE_CHECK,
    title: 'Check balance',
    example: 'balance',
  },
  {
    option: 5,
    commandType: COMMAND_TYPES.TRANSACTION_HISTORY,
    title: 'Transaction history',
    example: 'history',
  },
] as const satisfies readonly MenuCommand[];

/** Extra commands listed under the menu in the help text */
export const EXTRA_COMMANDS: readonly Pick<MenuCommand, 'title' | 'example'>[] = [
  { title: 'Cable TV', example: 'renew dstv' },
  { title: 'Referral code', example: 'referral' },
];
