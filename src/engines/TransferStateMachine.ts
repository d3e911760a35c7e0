/**
 * Máquina de estados explícita de una transferencia (FileDownloadTask).
 *
 * Las transiciones permitidas se definen en una tabla; cualquier transición no listada
 * es inválida y FileDownloadTask la rechaza lanzando un error de programación.
 *
 * @module TransferStateMachine
 */

import { TransferStatus, type TransferStatusType } from './types';

const S = TransferStatus;

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * verified, failed y cancelled son terminales.
 */
const TRANSITIONS: Readonly<Record<TransferStatusType, readonly TransferStatusType[]>> = {
  [S.NOT_STARTED]: [S.CHECKING_EXISTING, S.CANCELLED],
  [S.CHECKING_EXISTING]: [
    S.VERIFIED,
    S.CORRUPT,
    S.RESUMING,
    S.DOWNLOADING,
    S.VERIFYING,
    S.RETRYING,
    S.FAILED,
    S.CANCELLED,
  ],
  [S.RESUMING]: [S.DOWNLOADING, S.VERIFYING, S.RETRYING, S.FAILED, S.CANCELLED],
  [S.DOWNLOADING]: [S.VERIFYING, S.RETRYING, S.FAILED, S.CANCELLED],
  [S.VERIFYING]: [S.VERIFIED, S.CORRUPT, S.RETRYING, S.FAILED, S.CANCELLED],
  // corrupt en checking_existing cae a la descarga; en verifying pasa a reintento
  [S.CORRUPT]: [S.DOWNLOADING, S.RESUMING, S.VERIFYING, S.RETRYING, S.FAILED, S.CANCELLED],
  [S.RETRYING]: [S.CHECKING_EXISTING, S.FAILED, S.CANCELLED],
  [S.VERIFIED]: [],
  [S.FAILED]: [],
  [S.CANCELLED]: [],
};

/** Error de programación: nunca se reintenta ni se contiene en la tarea. */
export class InvalidTransitionError extends Error {
  constructor(fileName: string, from: TransferStatusType, to: TransferStatusType) {
    super(`Transición inválida ${from} → ${to} en ${fileName}`);
    this.name = 'InvalidTransitionError';
  }
}

export function canTransition(from: TransferStatusType, to: TransferStatusType): boolean {
  return TRANSITIONS[from].includes(to);
}

export const TERMINAL_STATES: readonly TransferStatusType[] = [
  S.VERIFIED,
  S.FAILED,
  S.CANCELLED,
];

export function isTerminalStatus(status: TransferStatusType): boolean {
  return TERMINAL_STATES.includes(status);
}
