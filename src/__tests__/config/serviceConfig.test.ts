import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_SERVICE_SETTINGS, ServiceConfig, isMissingFile } from '../../config/serviceConfig';
import { ConfigurationError } from '../../errors';

describe('ServiceConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'service-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should deep-merge a YAML file over the defaults', async () => {
      const file = path.join(dir, 'config.yaml');
      await fs.writeFile(
        file,
        [
          'email:',
          '  server: imap.example.test',
          '  username: printer@example.test',
          '  password: test-secret',
          'printer:',
          '  name: Office',
        ].join('\n')
      );

      const config = await ServiceConfig.load(file);

      expect(config.get('email.server')).toBe('imap.example.test');
      expect(config.get('email.port')).toBe(993);
      expect(config.get('email.inbox_folder')).toBe('INBOX');
      expect(config.get('printer.name')).toBe('Office');
      expect(config.get('printer.paper_size')).toBe('A4');
      expect(config.values.processing.attachment_wait).toEqual({
        base_seconds: 5,
        per_attachment_seconds: 2,
        max_seconds: 30,
      });
    });

    it('should replace lists instead of merging them', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ filters: { allowed_attachments: ['.pdf'] } }));

      const config = await ServiceConfig.load(file);

      expect(config.values.filters.allowed_attachments).toEqual(['.pdf']);
    });

    it('should write the defaults when the file is missing', async () => {
      const file = path.join(dir, 'nested', 'config.yaml');

      const config = await ServiceConfig.load(file);
      const written = parseYaml(await fs.readFile(file, 'utf-8'));

      expect(config.values).toEqual(DEFAULT_SERVICE_SETTINGS);
      expect(written).toEqual(DEFAULT_SERVICE_SETTINGS);
    });

    it('should reject values of the wrong type', async () => {
      const file = path.join(dir, 'config.yaml');
      await fs.writeFile(file, 'email:\n  port: "not a number"\n');

      await expect(ServiceConfig.load(file)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject unparseable files', async () => {
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, '{ not json');

      await expect(ServiceConfig.load(file)).rejects.toThrow('Cannot parse configuration file');
    });
  });

  describe('isMissingFile', () => {
    it('should recognise ENOENT by its code alone', () => {
      expect(isMissingFile({ code: 'ENOENT', message: 'no such file' })).toBe(true);
      expect(isMissingFile(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    });

    it('should reject other errors', () => {
      expect(isMissingFile({ code: 'EACCES' })).toBe(false);
      expect(isMissingFile(new Error('ENOENT'))).toBe(false);
      expect(isMissingFile('ENOENT')).toBe(false);
      expect(isMissingFile(null)).toBe(false);
    });
  });

  describe('get and set', () => {
    it('should return the default for unknown keys', () => {
      const config = ServiceConfig.fromObject();

      expect(config.get('email.missing', 'fallback')).toBe('fallback');
      expect(config.get('nope.deeper')).toBeUndefined();
    });

    it('should set values by dot path', () => {
      const config = ServiceConfig.fromObject();

      config.set('email.check_interval', 60);

      expect(config.get('email.check_interval')).toBe(60);
      expect(config.values.email.check_interval).toBe(60);
    });

    it('should refuse values that break the schema', () => {
      const config = ServiceConfig.fromObject();

      expect(() => config.set('email.port', 'imap')).toThrow(ConfigurationError);
      expect(config.get('email.port')).toBe(993);
    });
  });

  describe('save', () => {
    it('should round-trip through YAML', async () => {
      const file = path.join(dir, 'config.yaml');
      const config = await ServiceConfig.load(file);
      config.set('printer.name', 'Front Desk');

      await config.save();
      const reloaded = await ServiceConfig.load(file);

      expect(reloaded.get('printer.name')).toBe('Front Desk');
    });

    it('should require a path for in-memory configs', async () => {
      await expect(ServiceConfig.fromObject().save()).rejects.toThrow(
        'No configuration file path to save to'
      );
    });
  });

  describe('validate', () => {
    it('should list every missing required setting', () => {
      const config = ServiceConfig.fromObject({ printer: { name: '  ' } });

      try {
        config.validate();
        throw new Error('expected validate to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.issues).toEqual([
            'email.username is required',
            'email.password is required',
            'printer.name must not be empty',
          ]);
        }
      }
    });

    it('should reject a non-positive port', () => {
      const config = ServiceConfig.fromObject({
        email: { username: 'u', password: 'test-secret', port: 0 },
      });

      expect(() => config.validate()).toThrow('email.port must be positive');
    });

    it('should pass with credentials present', () => {
      const config = ServiceConfig.fromObject({
        email: { username: 'u', password: 'test-secret' },
      });

      expect(() => config.validate()).not.toThrow();
    });
  });
});
