/**
 * Intent Classification Tests
 *
 * Acceptance Criteria:
 * - Handles: 'hi', 'help', 'balance', 'history', 'referral code'
 * - Handles: 'buy 1000 airtime', 'airtime 500 for 08012345678'
 * - Handles: 'buy 2gb mtn', 'glo 500mb for 08012345678'
 * - Handles: 'pay 5000 electricity', 'renew dstv'
 * - Rejected parameters keep the matched command (no fallthrough)
 * - Unrecognised text is unknown with low confidence
 */

import { describe, it, expect } from 'vitest';

import { MENU_COMMANDS } from '../commands';
import {
  COMMAND_PRIORITY,
  COMMAND_TYPES,
  createIntentClassifier,
  hasValidationError,
  isPurchaseCommand,
  isUnknownCommand,
  normalizeMessage,
} from '../parsing';

const classifier = createIntentClassifier();

describe('Intent Classification', () => {
  // ==========================================================================
  // Input normalization
  // ==========================================================================
  describe('normalizeMessage', () => {
    it('should trim, collapse whitespace, lowercase and straighten apostrophes', () => {
      expect(normalizeMessage('  What’s   MY\tBalance ')).toBe("what's my balance");
    });
  });

  // ==========================================================================
  // Commands without parameters
  // ==========================================================================
  describe('Commands without parameters', () => {
    it('should classify "Hi" as a high-confidence greeting', () => {
      expect(classifier.classify('Hi')).toEqual({
        commandType: COMMAND_TYPES.GREETING,
        rawText: 'Hi',
        confidence: 'high',
        parameters: {},
      });
    });

    it('should accept greetings with trailing punctuation', () => {
      expect(classifier.classify('Hello!').commandType).toBe(COMMAND_TYPES.GREETING);
      expect(classifier.classify('good morning').commandType).toBe(COMMAND_TYPES.GREETING);
    });

    it('should classify help requests', () => {
      expect(classifier.classify('help').commandType).toBe(COMMAND_TYPES.HELP);
      expect(classifier.classify('What can you do?').commandType).toBe(COMMAND_TYPES.HELP);
    });

    it('should classify balance checks', () => {
      expect(classifier.classify('balance').commandType).toBe(COMMAND_TYPES.BALANCE_CHECK);
      expect(classifier.classify('What’s my balance?').commandType).toBe(COMMAND_TYPES.BALANCE_CHECK);
      expect(classifier.classify('check my wallet').commandType).toBe(COMMAND_TYPES.BALANCE_CHECK);
    });

    it('should classify transaction history requests', () => {
      expect(classifier.classify('history').commandType).toBe(COMMAND_TYPES.TRANSACTION_HISTORY);
      expect(classifier.classify('show my recent transactions').commandType).toBe(
        COMMAND_TYPES.TRANSACTION_HISTORY
      );
    });

    it('should classify referral requests', () => {
      expect(classifier.classify('my referral code').commandType).toBe(COMMAND_TYPES.REFERRAL_INFO);
      expect(classifier.classify('invite friends').commandType).toBe(COMMAND_TYPES.REFERRAL_INFO);
    });
  });

  // ==========================================================================
  // Airtime
  // ==========================================================================
  describe('Airtime purchase', () => {
    it('should parse "buy 1000 airtime"', () => {
      expect(classifier.classify('buy 1000 airtime')).toEqual({
        commandType: COMMAND_TYPES.AIRTIME_PURCHASE,
        rawText: 'buy 1000 airtime',
        confidence: 'high',
        parameters: { amount: 1000 },
      });
    });

    it('should parse an amount after the keyword and a recipient', () => {
      const result = classifier.classify('airtime 500 for 08012345678');

      expect(result.commandType).toBe(COMMAND_TYPES.AIRTIME_PURCHASE);
      expect(result.confidence).toBe('high');
      expect(result.parameters).toEqual({ amount: 500, phone: '2348012345678' });
    });

    it('should parse naira signs and thousands separators', () => {
      expect(classifier.classify('buy ₦1,000 airtime').parameters.amount).toBe(1000);
    });

    it('should parse recharge and top up phrasing', () => {
      expect(classifier.classify('recharge 200').parameters).toEqual({ amount: 200 });
      expect(classifier.classify('Top up 300').parameters).toEqual({ amount: 300 });
    });

    it('should keep the airtime grammar when the amount is too low', () => {
      const result = classifier.classify('buy 30 airtime');

      expect(result.commandType).toBe(COMMAND_TYPES.AIRTIME_PURCHASE);
      expect(result.confidence).toBe('medium');
      expect(result.parameters).toEqual({
        error: { code: 'AmountTooLow', parameter: 'amount', input: '30', limit: 50 },
      });
    });

    it('should report an amount that is too high', () => {
      expect(classifier.classify('buy 60000 airtime').parameters.error).toEqual({
        code: 'AmountTooHigh',
        parameter: 'amount',
        input: '60000',
        limit: 50000,
      });
    });

    it('should never read a phone number as an amount', () => {
      const result = classifier.classify('airtime for 08012345678');

      expect(result.confidence).toBe('medium');
      expect(result.parameters).toEqual({
        phone: '2348012345678',
        error: { code: 'MissingRequiredParameter', parameter: 'amount' },
      });
    });

    it('should report a malformed recipient and lower confidence', () => {
      const result = classifier.classify('top up 500 for 08031234');

      expect(result.confidence).toBe('medium');
      expect(result.parameters).toEqual({
        amount: 500,
        error: { code: 'InvalidPhoneFormat', parameter: 'phone', input: '08031234' },
      });
    });

    it('should treat a bare amount as a low-confidence airtime guess', () => {
      expect(classifier.classify('1000')).toEqual({
        commandType: COMMAND_TYPES.AIRTIME_PURCHASE,
        rawText: '1000',
        confidence: 'low',
        parameters: { amount: 1000 },
      });
    });

    it('should read a recipient written in spaced groups', () => {
      expect(classifier.classify('buy 500 airtime for 0801 234 5678')).toEqual({
        commandType: COMMAND_TYPES.AIRTIME_PURCHASE,
        rawText: 'buy 500 airtime for 0801 234 5678',
        confidence: 'high',
        parameters: { amount: 500, phone: '2348012345678' },
      });
      expect(classifier.classify('airtime 500 to +234 801 234 5678').parameters).toEqual({
        amount: 500,
        phone: '2348012345678',
      });
    });

    it('should not read the groups of a spaced recipient as the amount', () => {
      expect(classifier.classify('airtime for 0801 234 5678').parameters).toEqual({
        phone: '2348012345678',
        error: { code: 'MissingRequiredParameter', parameter: 'amount' },
      });
    });

    it('should report a ten-digit amount as too high rather than a recipient', () => {
      const result = classifier.classify('buy 1000000000 airtime');

      expect(result.confidence).toBe('medium');
      expect(result.parameters).toEqual({
        error: { code: 'AmountTooHigh', parameter: 'amount', input: '1000000000', limit: 50000 },
      });
    });
  });

  // ==========================================================================
  // Data
  // ==========================================================================
  describe('Data purchase', () => {
    it('should parse "buy 2gb mtn"', () => {
      const result = classifier.classify('buy 2gb mtn');

      expect(result.commandType).toBe(COMMAND_TYPES.DATA_PURCHASE);
      expect(result.confidence).toBe('high');
      expect(result.parameters.network).toBe('mtn');
      expect(result.parameters.size?.megabytes).toBe(2048);
      expect(result.parameters.size).toEqual({ megabytes: 2048, bytes: 2147483648, display: '2.0GB' });
    });

    it('should parse network first, megabytes and a recipient', () => {
      expect(classifier.classify('glo 500mb for 08012345678').parameters).toEqual({
        network: 'glo',
        size: { megabytes: 500, bytes: 524288000, display: '500MB' },
        phone: '2348012345678',
      });
    });

    it('should floor fractional gigabytes', () => {
      expect(classifier.classify('buy 1.5gb airtel').parameters.size?.megabytes).toBe(1536);
    });

    it('should ask for the network when none is given', () => {
      const result = classifier.classify('buy 1gb');

      expect(result.commandType).toBe(COMMAND_TYPES.DATA_PURCHASE);
      expect(result.confidence).toBe('medium');
      expect(result.parameters.size?.megabytes).toBe(1024);
      expect(result.parameters.error).toEqual({ code: 'MissingRequiredParameter', parameter: 'network' });
    });

    it('should fail loudly on a misspelled network', () => {
      const result = classifier.classify('buy 2gb mtm');

      expect(result.confidence).toBe('medium');
      expect(result.parameters.network).toBeUndefined();
      expect(result.parameters.error).toEqual({ code: 'UnknownProvider', parameter: 'network', input: 'mtm' });
    });

    it('should not mistake everyday words for a network', () => {
      expect(classifier.classify('i want 1gb').parameters).toEqual({
        size: { megabytes: 1024, bytes: 1073741824, display: '1.0GB' },
        error: { code: 'MissingRequiredParameter', parameter: 'network' },
      });
      expect(classifier.classify('i need 2gb data').parameters.error).toEqual({
        code: 'MissingRequiredParameter',
        parameter: 'network',
      });
    });

    it('should read a spaced recipient after the network', () => {
      expect(classifier.classify('buy 2gb mtn for 0801 234 5678').parameters).toEqual({
        network: 'mtn',
        size: { megabytes: 2048, bytes: 2147483648, display: '2.0GB' },
        phone: '2348012345678',
      });
    });

    it('should not treat "recharge" with a data size as airtime', () => {
      expect(classifier.classify('recharge 1gb mtn').commandType).toBe(COMMAND_TYPES.DATA_PURCHASE);
    });
  });

  // ==========================================================================
  // Electricity and cable
  // ==========================================================================
  describe('Bills', () => {
    it('should parse "pay 5000 electricity"', () => {
      expect(classifier.classify('pay 5000 electricity')).toEqual({
        commandType: COMMAND_TYPES.ELECTRICITY_PAYMENT,
        rawText: 'pay 5000 electricity',
        confidence: 'high',
        parameters: { amount: 5000 },
      });
    });

    it('should apply electricity bounds rather than airtime bounds', () => {
      expect(classifier.classify('pay 200 electricity').parameters.error).toEqual({
        code: 'AmountTooLow',
        parameter: 'amount',
        input: '200',
        limit: 500,
      });
    });

    it('should parse "renew dstv"', () => {
      expect(classifier.classify('renew dstv')).toEqual({
        commandType: COMMAND_TYPES.CABLE_SUBSCRIPTION,
        rawText: 'renew dstv',
        confidence: 'high',
        parameters: { provider: 'dstv' },
      });
    });

    it('should reject an unsupported cable provider', () => {
      const result = classifier.classify('subscribe to showmax');

      expect(result.commandType).toBe(COMMAND_TYPES.CABLE_SUBSCRIPTION);
      expect(result.parameters.error).toEqual({ code: 'UnknownProvider', parameter: 'provider', input: 'showmax' });
    });
  });

  // ==========================================================================
  // Menu shortcuts
  // ==========================================================================
  describe('Menu shortcuts', () => {
    it('should map option numbers to commands', () => {
      expect(classifier.classify('4').commandType).toBe(COMMAND_TYPES.BALANCE_CHECK);
      expect(classifier.classify('5').commandType).toBe(COMMAND_TYPES.TRANSACTION_HISTORY);
    });

    it('should classify every menu option as the command it lists', () => {
      for (const command of MENU_COMMANDS) {
        expect(classifier.classify(String(command.option)).commandType).toBe(command.commandType);
      }
    });

    it('should ask for the missing parameter of a purchase option', () => {
      expect(classifier.classify('1')).toEqual({
        commandType: COMMAND_TYPES.AIRTIME_PURCHASE,
        rawText: '1',
        confidence: 'medium',
        parameters: { error: { code: 'MissingRequiredParameter', parameter: 'amount' } },
      });
      expect(classifier.classify('2').parameters.error).toEqual({
        code: 'MissingRequiredParameter',
        parameter: 'network',
      });
      expect(classifier.classify('3').commandType).toBe(COMMAND_TYPES.ELECTRICITY_PAYMENT);
    });
  });

  // ==========================================================================
  // Priority and unknown input
  // ==========================================================================
  describe('Priority and fallback', () => {
    it('should try grammars in a fixed order', () => {
      expect(COMMAND_PRIORITY).toEqual([
        'greeting',
        'help',
        'balance_check',
        'airtime_purchase',
        'data_purchase',
        'electricity_payment',
        'cable_subscription',
        'transaction_history',
        'referral_info',
      ]);
      expect(classifier.priority).toEqual(COMMAND_PRIORITY);
    });

    it('should let the higher-priority grammar win on shared keywords', () => {
      const result = classifier.classify('buy 1000 airtime and 2gb data');

      expect(result.commandType).toBe(COMMAND_TYPES.AIRTIME_PURCHASE);
      expect(result.parameters).toEqual({ amount: 1000 });
    });

    it('should classify unrecognised text as unknown with low confidence', () => {
      const result = classifier.classify('tell me a joke');

      expect(result).toEqual({
        commandType: COMMAND_TYPES.UNKNOWN,
        rawText: 'tell me a joke',
        confidence: 'low',
        parameters: {},
      });
      expect(isUnknownCommand(result)).toBe(true);
    });

    it('should classify blank input as unknown', () => {
      expect(classifier.classify('   ')).toEqual({
        commandType: COMMAND_TYPES.UNKNOWN,
        rawText: '   ',
        confidence: 'low',
        parameters: {},
      });
    });
  });

  // ==========================================================================
  // Result properties
  // ==========================================================================
  describe('Result properties', () => {
    it('should ignore case apart from rawText', () => {
      const upper = classifier.classify('HI');
      const lower = classifier.classify('hi');

      expect(upper.rawText).toBe('HI');
      expect({ ...upper, rawText: lower.rawText }).toEqual(lower);
      expect(classifier.classify('BUY 2GB MTN').parameters).toEqual(classifier.classify('buy 2gb mtn').parameters);
    });

    it('should give structurally equal results for the same text', () => {
      expect(classifier.classify('buy 2gb mtn for 08012345678')).toEqual(
        classifier.classify('buy 2gb mtn for 08012345678')
      );
    });

    it('should freeze results', () => {
      const result = classifier.classify('buy 2gb mtn');

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.parameters)).toBe(true);
      expect(Object.isFrozen(result.parameters.size)).toBe(true);
    });

    it('should expose purchase and error guards', () => {
      const invalid = classifier.classify('buy 30 airtime');

      expect(isPurchaseCommand(invalid)).toBe(true);
      expect(hasValidationError(invalid)).toBe(true);
      expect(isPurchaseCommand(classifier.classify('balance'))).toBe(false);
      expect(hasValidationError(classifier.classify('buy 1000 airtime'))).toBe(false);
    });
  });
});
