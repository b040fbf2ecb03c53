import { describe, it, expect } from 'vitest';
import {
  Serializer,
  DictSerializer,
  compileSerializer,
  fields,
  SerializationException,
  ConfigurationException,
} from '../src/index.js';

// ============================================================================
// Serializer
// ============================================================================

describe('Serializer', () => {
  class ASerializer extends Serializer {
    static override fields = { a: new fields.Field() };
  }

  it('should serialize a simple object', () => {
    expect(new ASerializer({ a: 5 }).data).toEqual({ a: 5 });
  });

  it('should return the same data object on every access', () => {
    const serializer = new ASerializer({ a: 5 });
    const first = serializer.data;
    const second = serializer.data;

    expect(first).toBe(second);
  });

  it('should compile each serializer class once', () => {
    expect(compileSerializer(ASerializer)).toBe(compileSerializer(ASerializer));
  });

  it('should compose field maps of other serializers', () => {
    class CSerializer extends Serializer {
      static override fields = { c: new fields.Field() };
    }
    class ABSerializer extends ASerializer {
      static override fields = { ...ASerializer.fields, b: new fields.Field() };
    }
    class ABCSerializer extends ABSerializer {
      static override fields = { ...ABSerializer.fields, ...CSerializer.fields };
    }

    const source = { a: 5, b: 'hello', c: 100 };

    expect(new ASerializer(source).data).toEqual({ a: 5 });
    expect(new ABSerializer(source).data).toEqual({ a: 5, b: 'hello' });
    expect(new ABCSerializer(source).data).toEqual({ a: 5, b: 'hello', c: 100 });
  });

  it('should let later fields override earlier ones by name', () => {
    class OverrideSerializer extends ASerializer {
      static override fields = { ...ASerializer.fields, a: new fields.CharField() };
    }

    expect(new OverrideSerializer({ a: 5 }).data).toEqual({ a: '5' });
  });

  it('should serialize many objects in order', () => {
    const objects = [0, 1, 2, 3, 4].map((a) => ({ a }));

    expect(new ASerializer(objects, { many: true }).data).toEqual([
      { a: 0 },
      { a: 1 },
      { a: 2 },
      { a: 3 },
      { a: 4 },
    ]);
  });

  it('should serialize any iterable with many', () => {
    const objects = new Set([{ a: 'x' }, { a: 'y' }]);

    expect(new ASerializer(objects, { many: true }).data).toEqual([{ a: 'x' }, { a: 'y' }]);
  });

  it('should reject a non-iterable with many', () => {
    expect(() => new ASerializer(5, { many: true }).data).toThrow(
      new TypeError("'number' object is not iterable")
    );
  });

  it('should read dotted attribute paths', () => {
    class DeepSerializer extends Serializer {
      static override fields = { a: new fields.Field({ source: 'a.b.c' }) };
    }

    expect(new DeepSerializer({ a: { b: { c: 2 } } }).data).toEqual({ a: 2 });
  });

  it('should read class getters', () => {
    class User {
      constructor(
        readonly firstName: string,
        readonly lastName: string
      ) {}

      get fullName(): string {
        return `${this.firstName} ${this.lastName}`;
      }
    }
    class UserSerializer extends Serializer {
      static override fields = { fullName: new fields.CharField() };
    }

    expect(new UserSerializer(new User('Ada', 'Lovelace')).data).toEqual({ fullName: 'Ada Lovelace' });
  });

  it('should rename output keys with label', () => {
    class LabelSerializer extends Serializer {
      static override fields = { a: new fields.IntegerField({ label: 'alpha' }) };
    }

    expect(new LabelSerializer({ a: '3' }).data).toEqual({ alpha: 3 });
  });

  it('should call toValue of built-in fields', () => {
    class TypedSerializer extends Serializer {
      static override fields = {
        a: new fields.IntegerField(),
        b: new fields.FloatField({ invoke: true }),
        c: new fields.CharField({ source: 'foo.bar.baz' }),
      };
    }

    const source = { a: 5, b: () => '6.2', foo: { bar: { baz: 10 } } };

    expect(new TypedSerializer(source).data).toEqual({ a: 5, b: 6.2, c: '10' });
  });

  it('should keep this when invoking methods', () => {
    class Counter {
      count = 3;

      total(): number {
        return this.count * 2;
      }
    }
    class CounterSerializer extends Serializer {
      static override fields = { total: new fields.IntegerField({ invoke: true }) };
    }

    expect(new CounterSerializer(new Counter()).data).toEqual({ total: 6 });
  });

  it('should support custom fields', () => {
    class Add5Field extends fields.Field {
      override toValue(value: unknown): unknown {
        return Number(value) + 5;
      }
    }
    class CustomSerializer extends Serializer {
      static override fields = { a: new Add5Field() };
    }

    expect(new CustomSerializer({ a: 10 }).data).toEqual({ a: 15 });
  });

  describe('required and optional fields', () => {
    class OptionalSerializer extends Serializer {
      static override fields = { a: new fields.IntegerField({ required: false }) };
    }
    class RequiredSerializer extends Serializer {
      static override fields = { a: new fields.IntegerField() };
    }

    it('should emit null for an optional field holding null', () => {
      expect(new OptionalSerializer({ a: null }).data).toEqual({ a: null });
    });

    it('should emit null for an optional field holding undefined', () => {
      expect(new OptionalSerializer({ a: undefined }).data).toEqual({ a: null });
    });

    it('should coerce an optional field holding a value', () => {
      expect(new OptionalSerializer({ a: '5' }).data).toEqual({ a: 5 });
    });

    it('should drop an optional field that fails coercion', () => {
      expect(new OptionalSerializer({ a: 'five' }).data).toEqual({});
    });

    it('should drop an optional field missing from the source', () => {
      expect(new OptionalSerializer({}).data).toEqual({});
    });

    it('should fail a required field holding null', () => {
      expect(() => new RequiredSerializer({ a: null }).data).toThrow(SerializationException);
      expect(() => new RequiredSerializer({ a: null }).data).toThrow(
        "Field 'a': Integer argument must be a string or a number, not 'null'"
      );
    });

    it('should fail a required field missing from the source', () => {
      expect(() => new RequiredSerializer({}).data).toThrow(
        "Field 'a': 'Object' object has no attribute 'a'"
      );
    });

    it('should report the failure with a 500 serialization error', () => {
      let caught: unknown;
      try {
        void new RequiredSerializer({ a: 'x' }).data;
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SerializationException);
      if (!(caught instanceof SerializationException)) return;
      expect(caught.status).toBe(500);
      expect(caught.code).toBe('SERIALIZATION_ERROR');
      expect(caught.message).toBe("Field 'a': Invalid literal for integer: 'x'");
    });
  });
});

// ============================================================================
// DictSerializer
// ============================================================================

describe('DictSerializer', () => {
  it('should read fields by key', () => {
    class ADictSerializer extends DictSerializer {
      static override fields = {
        a: new fields.IntegerField(),
        b: new fields.Field({ source: 'foo' }),
      };
    }

    expect(new ADictSerializer({ a: '2', foo: 'hello' }).data).toEqual({ a: 2, b: 'hello' });
  });

  it('should treat dotted sources as plain keys', () => {
    class DottedSerializer extends DictSerializer {
      static override fields = { a: new fields.Field({ source: 'x.y' }) };
    }

    expect(new DottedSerializer({ 'x.y': 1 }).data).toEqual({ a: 1 });
  });

  it('should read Map instances', () => {
    class MapSerializer extends DictSerializer {
      static override fields = { a: new fields.IntegerField() };
    }

    expect(new MapSerializer(new Map([['a', '7']])).data).toEqual({ a: 7 });
  });

  it('should render an optional field holding null', () => {
    class OptionalSerializer extends DictSerializer {
      static override fields = { a: new fields.Field({ required: false }) };
    }

    expect(new OptionalSerializer({ a: null }).data).toEqual({ a: null });
  });

  it('should skip an optional key that does not exist', () => {
    class OptionalSerializer extends DictSerializer {
      static override fields = { a: new fields.Field({ required: false }) };
    }

    expect(new OptionalSerializer({}).data).toEqual({});
  });

  it('should fail a required key that does not exist', () => {
    class RequiredSerializer extends DictSerializer {
      static override fields = { a: new fields.Field() };
    }

    expect(() => new RequiredSerializer({}).data).toThrow("Field 'a': Key 'a' not found");
  });

  it('should fail a required field on a non-mapping source', () => {
    class RequiredSerializer extends DictSerializer {
      static override fields = { a: new fields.Field() };
    }

    expect(() => new RequiredSerializer(42).data).toThrow("Field 'a': Expected a mapping, got number");
  });
});

// ============================================================================
// Nested serializers
// ============================================================================

describe('SerializerField', () => {
  class ASerializer extends Serializer {
    static override fields = { a: new fields.Field() };
  }

  it('should nest a serializer', () => {
    class BSerializer extends Serializer {
      static override fields = { b: new fields.SerializerField(ASerializer) };
    }

    expect(new BSerializer({ b: { a: 3 } }).data).toEqual({ b: { a: 3 } });
  });

  it('should nest many objects', () => {
    class BSerializer extends Serializer {
      static override fields = { b: new fields.SerializerField(ASerializer, { many: true }) };
    }

    const source = { b: [0, 1, 2].map((a) => ({ a })) };

    expect(new BSerializer(source).data).toEqual({ b: [{ a: 0 }, { a: 1 }, { a: 2 }] });
  });

  it('should invoke the value before nesting', () => {
    class BSerializer extends Serializer {
      static override fields = { b: new fields.SerializerField(ASerializer, { invoke: true }) };
    }

    expect(new BSerializer({ b: () => ({ a: 3 }) }).data).toEqual({ b: { a: 3 } });
  });

  it('should emit null for an optional nested value that is null', () => {
    class BSerializer extends Serializer {
      static override fields = { b: new fields.SerializerField(ASerializer, { required: false }) };
    }

    expect(new BSerializer({ b: null }).data).toEqual({ b: null });
  });

  it('should surface nested failures of required fields', () => {
    class BSerializer extends Serializer {
      static override fields = { b: new fields.SerializerField(ASerializer) };
    }

    expect(() => new BSerializer({ b: {} }).data).toThrow(SerializationException);
  });
});

// ============================================================================
// MethodField
// ============================================================================

describe('MethodField', () => {
  it('should call get<Name> by default and a named method when given', () => {
    class MathSerializer extends Serializer {
      static override fields = {
        a: new fields.MethodField(),
        b: new fields.MethodField('add9'),
      };

      getA(obj: { a: number }): number {
        return obj.a + 5;
      }

      add9(obj: { a: number }): number {
        return obj.a + 9;
      }
    }

    expect(new MathSerializer({ a: 2 }).data).toEqual({ a: 7, b: 11 });
  });

  it('should call the method with the serializer as this', () => {
    class PrefixSerializer extends Serializer {
      static override fields = { label: new fields.MethodField() };

      readonly prefix = '#';

      getLabel(obj: { id: number }): string {
        return `${this.prefix}${obj.id}`;
      }
    }

    expect(new PrefixSerializer({ id: 4 }).data).toEqual({ label: '#4' });
  });

  it('should return null from a required method', () => {
    class NullSerializer extends Serializer {
      static override fields = { a: new fields.MethodField() };

      getA(): null {
        return null;
      }
    }

    expect(new NullSerializer({}).data).toEqual({ a: null });
  });

  it('should return null from an optional method', () => {
    class NullSerializer extends Serializer {
      static override fields = { a: new fields.MethodField(undefined, { required: false }) };

      getA(): null {
        return null;
      }
    }

    expect(new NullSerializer({}).data).toEqual({ a: null });
  });

  it('should reject a missing method when the class is compiled', () => {
    class BrokenSerializer extends Serializer {
      static override fields = { a: new fields.MethodField() };
    }

    expect(() => new BrokenSerializer({}).data).toThrow(ConfigurationException);
    expect(() => compileSerializer(BrokenSerializer)).toThrow(
      "BrokenSerializer has no method 'getA' for MethodField 'a'"
    );
  });
});
