/**
 * Why a driver portal login was rejected.
 * The two reasons are kept apart for user feedback; callers that must not
 * reveal which half failed collapse them into one message.
 */
export enum AccessFailureReason {
  DriverNotFound = 'DriverNotFound',
  IncorrectBankDigits = 'IncorrectBankDigits'
}

export const ACCESS_FAILURE_MESSAGES: Record<AccessFailureReason, string> = {
  [AccessFailureReason.DriverNotFound]: 'Driver ID not found.',
  [AccessFailureReason.IncorrectBankDigits]: 'Incorrect Bank Account digits.'
};

export const GENERIC_ACCESS_FAILURE_MESSAGE = 'Invalid driver ID or bank digits.';
