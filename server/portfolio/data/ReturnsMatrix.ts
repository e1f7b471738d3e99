/**
 * ReturnsMatrix - Matriz de retornos periódicos (datas × ativos)
 *
 * Invariantes verificadas na construção:
 * - datas estritamente crescentes
 * - toda linha tem um valor finito para cada ativo
 * - nomes de ativos únicos
 *
 * A matriz é somente leitura; slice() devolve uma visão nova sem copiar linhas.
 */

import { createAssetMismatchError, createConfigInvalidError } from "../utils/PortfolioErrors";
import { dotProduct } from "../math/matrix";

export interface ReturnsRecord {
  date: Date | string;
  returns: Record<string, number>;
}

export class ReturnsMatrix {
  readonly assets: readonly string[];
  readonly dates: readonly Date[];
  readonly rows: readonly (readonly number[])[];

  constructor(assets: string[], dates: Date[], rows: number[][]) {
    if (assets.length === 0) {
      throw createConfigInvalidError("returns", "matriz sem ativos");
    }
    if (new Set(assets).size !== assets.length) {
      throw createConfigInvalidError("returns", "ativos duplicados na matriz de retornos");
    }
    if (dates.length !== rows.length) {
      throw createConfigInvalidError("returns", `${dates.length} datas para ${rows.length} linhas`);
    }

    for (let t = 0; t < rows.length; t++) {
      if (Number.isNaN(dates[t].getTime())) {
        throw createConfigInvalidError("returns", `data inválida na linha ${t}`);
      }
      if (t > 0 && dates[t].getTime() <= dates[t - 1].getTime()) {
        throw createConfigInvalidError("returns", `datas fora de ordem cronológica na linha ${t}`);
      }
      if (rows[t].length !== assets.length) {
        throw createConfigInvalidError("returns", `linha ${t} tem ${rows[t].length} valores, esperado ${assets.length}`);
      }
      for (let j = 0; j < assets.length; j++) {
        if (!Number.isFinite(rows[t][j])) {
          throw createConfigInvalidError("returns", `valor ausente ou não finito em ${assets[j]} na linha ${t}`);
        }
      }
    }

    this.assets = assets;
    this.dates = dates;
    this.rows = rows;
  }

  /**
   * Constrói a matriz a partir de registros { date, returns: { ativo: r } }
   */
  static fromRecords(records: ReturnsRecord[], assets?: string[]): ReturnsMatrix {
    const columns = assets ?? (records.length > 0 ? Object.keys(records[0].returns) : []);
    const dates = records.map(r => (r.date instanceof Date ? r.date : new Date(r.date)));
    const rows = records.map((r, t) =>
      columns.map(asset => {
        const value = r.returns[asset];
        if (value === undefined) {
          throw createConfigInvalidError("returns", `valor ausente para ${asset} na linha ${t}`);
        }
        return value;
      })
    );
    return new ReturnsMatrix(columns, dates, rows);
  }

  get periods(): number {
    return this.rows.length;
  }

  /**
   * Linhas [start, end)
   */
  slice(start: number, end: number): ReturnsMatrix {
    return new ReturnsMatrix(
      [...this.assets],
      this.dates.slice(start, end),
      this.rows.slice(start, end).map(r => [...r])
    );
  }

  column(index: number): number[] {
    return this.rows.map(row => row[index]);
  }

  toArray(): number[][] {
    return this.rows.map(r => [...r]);
  }

  /**
   * Série de retornos da carteira: r_t = w · R_t
   */
  portfolioReturns(weights: number[]): number[] {
    return this.rows.map(row => dotProduct(weights, [...row]));
  }

  /**
   * Reordena as colunas para a ordem de ativos da especificação.
   * O conjunto de colunas precisa ser exatamente o conjunto de ativos.
   */
  alignTo(assets: readonly string[]): ReturnsMatrix {
    const sameSet = assets.length === this.assets.length && assets.every(a => this.assets.includes(a));
    if (!sameSet) {
      throw createAssetMismatchError([...assets], [...this.assets]);
    }

    if (assets.every((a, i) => this.assets[i] === a)) {
      return this;
    }

    const order = assets.map(a => this.assets.indexOf(a));
    return new ReturnsMatrix(
      [...assets],
      [...this.dates],
      this.rows.map(row => order.map(j => row[j]))
    );
  }
}
