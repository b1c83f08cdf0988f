import { err, ok, type Result } from '../result.js'
import type { FlowInput, ValidationResult } from './types.js'

export const VALID_DENOMINATIONS = ['USD', 'ZWG', 'CAD', 'XAU'] as const
export type Denomination = typeof VALID_DENOMINATIONS[number]
export const DEFAULT_DENOMINATION: Denomination = 'USD'

export const CONFIRM_BUTTON_ID = 'confirm_action'
export const CANCEL_BUTTON_ID = 'cancel'

const AMOUNT_PATTERN = /^(?:([A-Z]{3})\s+(\d+(?:\.\d+)?)|(\d+(?:\.\d+)?)\s+([A-Z]{3})|(\d+(?:\.\d+)?))$/
const HANDLE_PATTERN = /^[a-zA-Z0-9_]+$/
const NAME_PATTERN = /^[A-Za-z]+(?: [A-Za-z]+)*$/

export interface ParsedAmount {
  amount: number
  denom: Denomination
}

function isDenomination(value: string): value is Denomination {
  return VALID_DENOMINATIONS.some(denom => denom === value)
}

export function inputText(input: FlowInput): string | null {
  return typeof input.value === 'string' ? input.value.trim() : null
}

export function formValue(input: FlowInput, ...keys: string[]): string | null {
  if (typeof input.value === 'string') {
    return null
  }
  for (const key of keys) {
    const value = input.value[key]
    if (value !== undefined) {
      return value.trim()
    }
  }
  return null
}

/** Accepts `100`, `USD 100` and `100 USD`; the denomination defaults to USD. */
export function parseAmount(raw: string): Result<ParsedAmount, string> {
  const match = AMOUNT_PATTERN.exec(raw.trim().toUpperCase())
  if (!match) {
    return err('invalid_amount')
  }

  const denom = match[1] ?? match[4] ?? DEFAULT_DENOMINATION
  const amountText = match[2] ?? match[3] ?? match[5] ?? ''
  if (!isDenomination(denom)) {
    return err('invalid_denomination')
  }

  const amount = Number(amountText)
  if (!Number.isFinite(amount) || amount <= 0) {
    return err('invalid_amount')
  }
  return ok({ amount, denom })
}

export function validateAmountInput(input: FlowInput): ValidationResult {
  const text = inputText(input)
  if (text === null || text === '') {
    return { valid: false, reason: 'invalid_amount' }
  }
  const parsed = parseAmount(text)
  return parsed.ok ? { valid: true } : { valid: false, reason: parsed.error }
}

export function isValidHandle(raw: string): boolean {
  return HANDLE_PATTERN.test(raw.trim())
}

export function validateHandleInput(input: FlowInput): ValidationResult {
  const text = inputText(input)
  return text !== null && isValidHandle(text)
    ? { valid: true }
    : { valid: false, reason: 'invalid_handle' }
}

export function isValidName(raw: string): boolean {
  const name = raw.trim()
  return name.length >= 3 && name.length <= 50 && NAME_PATTERN.test(name)
}

export function validateNameInput(input: FlowInput): ValidationResult {
  const text = inputText(input)
  return text !== null && isValidName(text)
    ? { valid: true }
    : { valid: false, reason: 'invalid_name' }
}

export function validateConfirmInput(input: FlowInput): ValidationResult {
  const text = inputText(input)
  return text === CONFIRM_BUTTON_ID
    ? { valid: true }
    : { valid: false, reason: 'use_confirm_button' }
}

export function isCancelInput(input: FlowInput): boolean {
  const text = inputText(input)
  return text !== null && text.toLowerCase() === CANCEL_BUTTON_ID
}
