jest.mock('fs');

import 'reflect-metadata';
import { DirectoryValidationService } from '../directory-validation.service';
import { DirectoryNotFoundError } from '../../utils/errors';
import * as fs from 'fs';
import { resolve } from 'path';

const svc = new DirectoryValidationService();
const exists = fs.existsSync as jest.Mock;
const stat   = fs.statSync   as jest.Mock;

describe('DirectoryValidationService', () => {
  const DOWNLOADS = resolve(process.cwd(), 'home', 'downloads');

  beforeEach(() => {
    jest.resetAllMocks();
  });

  describe('validateDirectory', () => {
    it('fails when the directory does not exist', () => {
      exists.mockReturnValue(false);

      const res = svc.validateDirectory(DOWNLOADS);

      expect(res.isValid).toBe(false);
      expect(res.errors).toEqual([`Directory does not exist: ${DOWNLOADS}`]);
    });

    it('fails when the path is not a directory', () => {
      exists.mockReturnValue(true);
      stat.mockReturnValue({ isDirectory: () => false });

      const res = svc.validateDirectory(DOWNLOADS);

      expect(res.isValid).toBe(false);
      expect(res.errors).toEqual([`Path is not a directory: ${DOWNLOADS}`]);
    });

    it('passes for an existing directory and resolves relative paths', () => {
      exists.mockReturnValue(true);
      stat.mockReturnValue({ isDirectory: () => true });

      const res = svc.validateDirectory('home/downloads');

      expect(res).toEqual({ isValid: true, resolvedPath: DOWNLOADS, errors: [] });
      expect(exists).toHaveBeenCalledWith(DOWNLOADS);
    });
  });

  describe('requireDirectory', () => {
    it('returns the absolute path of a directory', () => {
      exists.mockReturnValue(true);
      stat.mockReturnValue({ isDirectory: () => true });

      expect(svc.requireDirectory('home/downloads')).toBe(DOWNLOADS);
    });

    it('throws DirectoryNotFoundError for a missing directory', () => {
      exists.mockReturnValue(false);

      expect(() => svc.requireDirectory(DOWNLOADS)).toThrow(DirectoryNotFoundError);
      expect(() => svc.requireDirectory(DOWNLOADS)).toThrow(`Directory does not exist: ${DOWNLOADS}`);
    });

    it('throws DirectoryNotFoundError for a file', () => {
      exists.mockReturnValue(true);
      stat.mockReturnValue({ isDirectory: () => false });

      expect(() => svc.requireDirectory(DOWNLOADS)).toThrow(`Path is not a directory: ${DOWNLOADS}`);
    });
  });
});
