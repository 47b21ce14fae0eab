import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ClassificationRulesError,
  ExternalTypeClassifier,
} from '../../src/utils/external-type-classifier';

function writeRules(directory: string, files: Record<string, unknown>): void {
  for (const [fileName, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(directory, fileName), JSON.stringify(content));
  }
}

describe('ExternalTypeClassifier', () => {
  describe('bundled rules', () => {
    let classifier: ExternalTypeClassifier;

    beforeAll(() => {
      classifier = new ExternalTypeClassifier();
    });

    it('should load every framework family', () => {
      expect(classifier.getSupportedFamilies().sort()).toEqual([
        'appkit',
        'conventions',
        'foundation',
        'swift-stdlib',
        'swiftui',
        'uikit',
      ]);
    });

    it('should classify UIKit classes by prefix with their module', () => {
      expect(classifier.classifyExternal('UIViewController')).toEqual({
        kind: 'class',
        moduleName: 'UIKit',
        matchedRule: 'name prefix: ^UI[A-Z]',
      });
    });

    it('should let exact names win over prefix and suffix rules', () => {
      const result = classifier.classifyExternal('UITableViewDelegate');
      expect(result.kind).toBe('protocol');
      expect(result.moduleName).toBe('UIKit');
      expect(result.matchedRule).toBe('exact: uikit.UITableViewDelegate');
    });

    it('should treat conventional protocol suffixes as protocols', () => {
      expect(classifier.classifyExternal('PaymentDelegate')).toEqual({
        kind: 'protocol',
        moduleName: null,
        matchedRule: 'name suffix: Delegate',
      });
      expect(classifier.isProtocolLike('Cancellable')).toBe(true);
      expect(classifier.isProtocolLike('Convertible')).toBe(true);
    });

    it('should take the module from the highest rule that names one', () => {
      // The DataSource suffix decides the kind; only the UIKit prefix names a module
      const result = classifier.classifyExternal('UIPickerViewDataSource');
      expect(result.kind).toBe('protocol');
      expect(result.moduleName).toBe('UIKit');
    });

    it('should fall back on capitalization when nothing matches', () => {
      expect(classifier.classifyExternal('Widget')).toEqual({
        kind: 'class',
        moduleName: null,
        matchedRule: 'fallback (no matching rules)',
      });
      expect(classifier.classifyExternal('widget').kind).toBe('struct');
    });

    it('should know the ancestry of framework classes', () => {
      expect(classifier.knownBaseChain('UIViewController')).toEqual(['UIResponder', 'NSObject']);
      expect(classifier.knownBaseChain('UIButton')).toEqual(['UIControl', 'UIView', 'UIResponder', 'NSObject']);
      expect(classifier.knownBaseChain('Widget')).toEqual([]);
    });

    it('should return a copy of the chain', () => {
      const chain = classifier.knownBaseChain('UIView');
      chain.push('Mutated');
      expect(classifier.knownBaseChain('UIView')).toEqual(['UIResponder', 'NSObject']);
    });
  });

  describe('custom rule directories', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'type-graph-rules-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should apply defaults for omitted sections', () => {
      writeRules(directory, {
        'acme.json': { acme: { module: 'AcmeKit', exactNames: { Gadget: 'struct' } } },
      });

      const classifier = new ExternalTypeClassifier(directory);
      expect(classifier.classifyExternal('Gadget')).toEqual({
        kind: 'struct',
        moduleName: 'AcmeKit',
        matchedRule: 'exact: acme.Gadget',
      });
      expect(classifier.knownBaseChain('Gadget')).toEqual([]);
    });

    it('should resolve conflicts by priority', () => {
      writeRules(directory, {
        'acme.json': {
          acme: {
            namePatterns: {
              prefix: [{ pattern: '^Acme', kind: 'class', priority: 10 }],
              suffix: [{ pattern: 'Service', kind: 'protocol', priority: 30 }],
            },
          },
        },
      });

      const classifier = new ExternalTypeClassifier(directory);
      expect(classifier.classifyExternal('AcmeService').kind).toBe('protocol');
      expect(classifier.classifyExternal('AcmeWidget').kind).toBe('class');
    });

    it('should not let a suffix rule match the bare suffix', () => {
      writeRules(directory, {
        'acme.json': {
          acme: { namePatterns: { suffix: [{ pattern: 'Service', kind: 'protocol', priority: 30 }] } },
        },
      });

      const classifier = new ExternalTypeClassifier(directory);
      expect(classifier.classifyExternal('Service').matchedRule).toBe('fallback (no matching rules)');
    });

    it('should reject a family defined in two files', () => {
      writeRules(directory, {
        'a.json': { acme: {} },
        'b.json': { acme: {} },
      });

      expect(() => new ExternalTypeClassifier(directory)).toThrow(
        'Duplicate family "acme" found in b.json. Family already defined in another file.'
      );
    });

    it('should reject invalid rule files with the offending path', () => {
      writeRules(directory, {
        'bad.json': { acme: { exactNames: { Gadget: 'widget' } } },
      });

      expect(() => new ExternalTypeClassifier(directory)).toThrow(ClassificationRulesError);
      expect(() => new ExternalTypeClassifier(directory)).toThrow(/Invalid rule format in bad\.json: acme\.exactNames\.Gadget/);
    });

    it('should reject prefix patterns that are not regular expressions', () => {
      writeRules(directory, {
        'bad.json': {
          acme: { namePatterns: { prefix: [{ pattern: '^AC[', kind: 'class', priority: 10 }] } },
        },
      });

      expect(() => new ExternalTypeClassifier(directory)).toThrow(
        'Invalid rule format in bad.json: acme.namePatterns.prefix.0.pattern: Invalid regular expression'
      );
    });

    it('should reject unreadable JSON', () => {
      fs.writeFileSync(path.join(directory, 'broken.json'), '{ not json');

      expect(() => new ExternalTypeClassifier(directory)).toThrow(/Could not read classification rules/);
    });

    it('should reject a missing or empty directory', () => {
      expect(() => new ExternalTypeClassifier(directory)).toThrow(`No JSON files found in ${directory}`);
      expect(() => new ExternalTypeClassifier(path.join(directory, 'missing'))).toThrow(
        /Classification rules directory not found/
      );
    });

    it('should pick up changes on reload', () => {
      writeRules(directory, { 'acme.json': { acme: { exactNames: { Gadget: 'struct' } } } });
      const classifier = new ExternalTypeClassifier(directory);

      writeRules(directory, { 'acme.json': { acme: { exactNames: { Gadget: 'protocol' } } } });
      classifier.reloadRules(directory);

      expect(classifier.classifyExternal('Gadget').kind).toBe('protocol');
    });
  });
});
