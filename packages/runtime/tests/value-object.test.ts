import { describe, it, expect } from "vitest";
import { include, valueObject } from "../src/decorators.js";
import { defaultEquals, defaultHash } from "../src/equality.js";
import { EqualityNotInstalledError } from "../src/errors.js";
import { hashCombine, hashString } from "../src/hashing.js";
import {
  SimpleValueObject,
  ValueObject,
  hasInstalledEquality,
  installEquality,
} from "../src/value-object.js";

@valueObject
class Unprepared extends ValueObject<Unprepared> {
  @include() readonly id: number = 1;
}

class Money extends ValueObject<Money> {
  constructor(
    readonly amount: number,
    readonly currency: string
  ) {
    super();
  }
}

class DiscountedMoney extends Money {}

installEquality(Money, {
  equals: (a, b) =>
    Object.getPrototypeOf(a) === Object.getPrototypeOf(b) &&
    defaultEquals(a.amount, b.amount) &&
    defaultEquals(a.currency, b.currency),
  hash: (value) => hashCombine(defaultHash(value.amount), defaultHash(value.currency)),
});

class TaxedMoney extends Money {
  constructor(
    amount: number,
    currency: string,
    readonly rate: number
  ) {
    super(amount, currency);
  }
}

const hashTaxedMoney = (value: TaxedMoney): number => defaultHash(value.rate);

installEquality(TaxedMoney, {
  equals: (a, b) => Object.getPrototypeOf(a) === Object.getPrototypeOf(b) && defaultEquals(a.rate, b.rate),
  hash: hashTaxedMoney,
});

class Email extends SimpleValueObject<Email, string> {}
class Username extends SimpleValueObject<Username, string> {}

describe("ValueObject", () => {
  it("throws when no generated equality is installed", () => {
    const value = new Unprepared();
    expect(() => value.equals(new Unprepared())).toThrow(EqualityNotInstalledError);
    expect(() => value.getHashCode()).toThrow("No generated equality is installed for 'Unprepared'");
    expect(hasInstalledEquality(Unprepared)).toBe(false);
  });

  it("uses the installed implementation", () => {
    const a = new Money(10, "EUR");
    expect(a.equals(new Money(10, "EUR"))).toBe(true);
    expect(a.equals(new Money(10, "USD"))).toBe(false);
    expect(a.equals(null)).toBe(false);
    expect(a.getHashCode()).toBe(new Money(10, "EUR").getHashCode());
  });

  it("lets subclasses inherit the nearest installation", () => {
    expect(hasInstalledEquality(DiscountedMoney)).toBe(true);
    expect(new DiscountedMoney(5, "EUR").equals(new DiscountedMoney(5, "EUR"))).toBe(true);
    expect(new Money(5, "EUR").equals(new DiscountedMoney(5, "EUR"))).toBe(false);
  });

  it("compares the members of an installed ancestor too", () => {
    const a = new TaxedMoney(5, "EUR", 20);
    expect(a.equals(new TaxedMoney(5, "EUR", 20))).toBe(true);
    expect(a.equals(new TaxedMoney(6, "EUR", 20))).toBe(false);
    expect(a.equals(new TaxedMoney(5, "EUR", 7))).toBe(false);
  });

  it("folds the ancestor hash into the derived hash", () => {
    const value = new TaxedMoney(5, "EUR", 20);
    const ancestor = hashCombine(defaultHash(5), defaultHash("EUR"));
    expect(value.getHashCode()).toBe(hashCombine(ancestor, hashTaxedMoney(value)));
  });
});

describe("SimpleValueObject", () => {
  it("compares the wrapped value", () => {
    expect(new Email("a@example.test").equals(new Email("a@example.test"))).toBe(true);
    expect(new Email("a@example.test").equals(new Email("b@example.test"))).toBe(false);
  });

  it("never equals another wrapper type", () => {
    const email = new Email("x");
    const user = new Username("x");
    expect(defaultEquals(email, user)).toBe(false);
  });

  it("hashes the type name with the value", () => {
    expect(new Email("x").getHashCode()).toBe(hashCombine(hashString("Email"), hashString("x")));
  });

  it("serializes as its value", () => {
    expect(JSON.stringify({ email: new Email("x") })).toBe('{"email":"x"}');
    expect(String(new Email("x"))).toBe("x");
  });
});
