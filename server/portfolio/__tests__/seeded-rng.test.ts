/**
 * Teste Unitário - SeededRNG
 *
 * Determinismo do gerador usado pela busca estocástica e pelas seeds
 * de cada data de rebalanceamento.
 */

import { describe, it, expect } from "vitest";
import { createRebalanceSeed, createSeededRNG, seedFromString } from "../utils/SeededRNG";

describe("SeededRNG - Gerador Determinístico", () => {
  describe("Determinismo", () => {
    it("deve produzir a mesma sequência com o mesmo seed", () => {
      const rng1 = createSeededRNG(12345);
      const rng2 = createSeededRNG(12345);

      const sequence1: number[] = [];
      const sequence2: number[] = [];
      for (let i = 0; i < 100; i++) {
        sequence1.push(rng1.random());
        sequence2.push(rng2.random());
      }

      expect(sequence1).toEqual(sequence2);
    });

    it("deve produzir sequências diferentes com seeds diferentes", () => {
      const rng1 = createSeededRNG(111);
      const rng2 = createSeededRNG(222);

      const sequence1 = Array.from({ length: 10 }, () => rng1.random());
      const sequence2 = Array.from({ length: 10 }, () => rng2.random());

      expect(sequence1).not.toEqual(sequence2);
    });
  });

  describe("Distribuições", () => {
    it("deve gerar valores entre 0 e 1", () => {
      const rng = createSeededRNG(42);
      for (let i = 0; i < 1000; i++) {
        const value = rng.random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it("deve gerar exponenciais positivas e finitas", () => {
      const rng = createSeededRNG(42);
      for (let i = 0; i < 1000; i++) {
        const value = rng.randomExponential();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(Number.isFinite(value)).toBe(true);
      }
    });

    it("deve gerar floats no range especificado", () => {
      const rng = createSeededRNG(42);
      for (let i = 0; i < 100; i++) {
        const value = rng.randomFloat(-0.2, 0.5);
        expect(value).toBeGreaterThanOrEqual(-0.2);
        expect(value).toBeLessThan(0.5);
      }
    });
  });

  describe("Algoritmos", () => {
    it("xorshift128 e mulberry32 devem produzir sequências diferentes", () => {
      const a = createSeededRNG(42, "xorshift128").random();
      const b = createSeededRNG(42, "mulberry32").random();
      expect(a).not.toBe(b);
    });

    it("deve funcionar com seed 0 e seeds negativos", () => {
      for (const seed of [0, -12345]) {
        const value = createSeededRNG(seed, "xorshift128").random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe("Seeds de rebalanceamento", () => {
    it("deve depender apenas do seed base e da data", () => {
      const date = new Date(Date.UTC(2021, 5, 30));
      expect(createRebalanceSeed(42, date)).toBe(createRebalanceSeed(42, new Date(Date.UTC(2021, 5, 30))));
      expect(createRebalanceSeed(42, date)).toBe(seedFromString("42-2021-06-30"));
    });

    it("datas diferentes devem gerar seeds diferentes", () => {
      const a = createRebalanceSeed(42, new Date(Date.UTC(2021, 5, 30)));
      const b = createRebalanceSeed(42, new Date(Date.UTC(2021, 6, 31)));
      expect(a).not.toBe(b);
    });

    it("seedFromString deve ser não negativo", () => {
      expect(seedFromString("")).toBe(0);
      expect(seedFromString("carteira")).toBeGreaterThanOrEqual(0);
    });
  });
});
