// backend/shared/src/entity/collectionResolver.test.ts

import { describe, it, expect } from "vitest";
import { ResolutionError } from "../errors/errors";
import { CollectionResolver } from "./collectionResolver";
import { deriveCollectionName, toSnakeCase } from "./naming";

class Car {
  carId = 0;
  name = "";
}

class CarOwner {
  ownerId = 0;
  carId = 0;
}

class Owner {
  static dbCollectionName(): string | null {
    return "people";
  }
  ownerId = 0;
}

/** A view type over Owner rows; inherits its base's collection. */
class OwnerSummary extends Owner {
  cars = 0;
}

class ArchivedOwner extends Owner {
  static dbCollectionName(): string | null {
    return null;
  }
}

class Broken {
  static dbCollectionName(): string {
    return "  ";
  }
}

describe("naming", () => {
  it("snake-cases class names without pluralizing", () => {
    expect(toSnakeCase("Car")).toBe("car");
    expect(toSnakeCase("CarOwner")).toBe("car_owner");
    expect(toSnakeCase("HTTPRequestLog")).toBe("http_request_log");
    expect(toSnakeCase("Order2Line")).toBe("order2_line");
  });

  it("supports lower and custom strategies", () => {
    expect(deriveCollectionName("CarOwner", "lower")).toBe("carowner");
    expect(deriveCollectionName("CarOwner", (n) => `${n}s`)).toBe("CarOwners");
    expect(deriveCollectionName("CarOwner")).toBe("car_owner");
  });
});

describe("CollectionResolver", () => {
  const resolver = new CollectionResolver();

  it("resolves the same name for every wrapping of a class", () => {
    const car = new Car();
    expect(resolver.resolve(Car)).toBe("car");
    expect(resolver.resolve(car)).toBe("car");
    expect(resolver.resolve([car])).toBe("car");
    expect(resolver.resolve([[car, new Car()]])).toBe("car");
    expect(resolver.resolve([Car])).toBe("car");
  });

  it("derives multi-word names", () => {
    expect(resolver.resolve(new CarOwner())).toBe("car_owner");
    expect(new CollectionResolver({ naming: "lower" }).resolve(CarOwner)).toBe("carowner");
  });

  it("lets the naming capability win over the derived name", () => {
    expect(resolver.resolve(Owner)).toBe("people");
    expect(resolver.resolve([new Owner()])).toBe("people");
  });

  it("inherits the base capability in subclasses", () => {
    expect(resolver.resolve(new OwnerSummary())).toBe("people");
  });

  it("derives from the class name when the capability opts out", () => {
    expect(resolver.resolve(ArchivedOwner)).toBe("archived_owner");
  });

  it("rejects values without a usable type", () => {
    expect(() => resolver.resolve([])).toThrow(ResolutionError);
    expect(() => resolver.resolve([[]])).toThrow("empty array carries no element type.");
    expect(() => resolver.resolve({ carId: 1 })).toThrow("plain objects have no declared type.");
    expect(() => resolver.resolve(Object.create(null))).toThrow(ResolutionError);
    expect(() => resolver.resolve(new Date())).toThrow("built-in type Date is not an entity.");
    expect(() => resolver.resolve(new Map())).toThrow(ResolutionError);
    expect(() => resolver.resolve(Broken)).toThrow('Broken.dbCollectionName() returned "  ".');
  });

  it("rejects anonymous classes without a capability", () => {
    const Anonymous = [class {}][0];
    expect(() => resolver.resolve(Anonymous)).toThrow(
      "anonymous classes need a static dbCollectionName()."
    );
  });

  it("exposes the element class of a shape", () => {
    expect(resolver.elementClass([[new CarOwner()]])).toBe(CarOwner);
  });
});
