import { describe, it, expect, beforeAll } from 'vitest';
import { PythonParser } from '../../../src/analyzer/parsers/python.js';
import { formatCall, receiverName, renderUsage, usageArguments } from '../../../src/render/usage.js';
import type { CallableDeclaration, ContainerDeclaration, ModuleTree } from '../../../src/types/index.js';

describe('usage examples', () => {
  let parser: PythonParser;
  let parse: (source: string) => ModuleTree;

  beforeAll(() => {
    parser = new PythonParser();
    parse = source => parser.parse('module.py', source);
  });

  function topLevel(source: string): CallableDeclaration {
    const [declaration] = parse(source).declarations;
    if (declaration?.kind !== 'callable') throw new Error('expected a function');
    return declaration;
  }

  function method(source: string, name: string): [CallableDeclaration, ContainerDeclaration] {
    const [container] = parse(source).declarations;
    if (container?.kind !== 'container') throw new Error('expected a class');
    const member = container.members.find(m => m.name === name);
    if (member?.kind !== 'callable') throw new Error(`expected method ${name}`);
    return [member, container];
  }

  describe('formatCall', () => {
    it('keeps zero or one argument inline', () => {
      expect(formatCall('f', [])).toBe('f()');
      expect(formatCall('f', ['a'])).toBe('f(a)');
    });

    it('puts several arguments on their own lines', () => {
      expect(formatCall('f', ['a', 'b=1'])).toBe('f(\n    a,\n    b=1\n)');
    });
  });

  describe('functions', () => {
    it('renders a call with defaults as keyword arguments', () => {
      expect(renderUsage(topLevel('def connect(host, port=80):\n    pass\n'))).toBe(
        'connect(\n    host,\n    port=80\n)'
      );
    });

    it('prefixes async functions with await', () => {
      expect(renderUsage(topLevel('async def fetch(url):\n    pass\n'))).toBe('await fetch(url)');
    });

    it('renders variadic parameters with their stars', () => {
      expect(usageArguments(topLevel('def f(*args, key=None, **kw):\n    pass\n'), false)).toEqual([
        '*args',
        'key=None',
        '**kw',
      ]);
    });

    it('renders an opaque default as the placeholder', () => {
      expect(renderUsage(topLevel('def f(cb=lambda: None):\n    pass\n'))).toBe('f(cb=...)');
    });
  });

  describe('methods', () => {
    const greeter = 'class Greeter:\n    def __init__(self, name: str = "World"):\n        pass\n\n    def greet(self):\n        pass\n';

    it('names the receiver after the class', () => {
      const [, container] = method(greeter, 'greet');
      expect(receiverName(container)).toBe('self.greeter_obj');
    });

    it('renders constructors as an instantiation', () => {
      expect(renderUsage(...method(greeter, '__init__'))).toBe("self.greeter_obj = Greeter(name='World')");
    });

    it('renders methods against the receiver', () => {
      expect(renderUsage(...method(greeter, 'greet'))).toBe('self.greeter_obj = Greeter\n\nself.greeter_obj.greet()');
    });

    it('drops cls from class methods', () => {
      const source = 'class A:\n    @classmethod\n    def make(cls, x):\n        pass\n';
      expect(renderUsage(...method(source, 'make'))).toBe('self.a_obj = A\n\nself.a_obj.make(x)');
    });

    it('keeps the first parameter of static methods', () => {
      const source = 'class Cache:\n    @staticmethod\n    def build(size=10):\n        pass\n';
      expect(renderUsage(...method(source, 'build'))).toBe('self.cache_obj = Cache\n\nself.cache_obj.build(size=10)');
    });

    it('prefixes async methods with await', () => {
      const source = 'class Client:\n    async def close(self):\n        pass\n';
      expect(renderUsage(...method(source, 'close'))).toBe('self.client_obj = Client\n\nawait self.client_obj.close()');
    });
  });
});
