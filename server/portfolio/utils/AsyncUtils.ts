/**
 * AsyncUtils - Multitarefa cooperativa
 *
 * A busca estocástica e o backtest cedem controle ao Event Loop para que
 * um abort() externo consiga ser processado no meio da execução.
 */

/**
 * Cede o controle ao Event Loop do Node.js.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

/**
 * Só cede se tiver passado mais que thresholdMs desde startTime.
 * Retorna o novo startTime.
 */
export async function yieldIfSlow(startTime: number, thresholdMs: number = 10): Promise<number> {
  const now = Date.now();
  if (now - startTime > thresholdMs) {
    await yieldToEventLoop();
    return Date.now();
  }
  return startTime;
}
