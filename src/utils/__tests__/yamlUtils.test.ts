/**
 * Tests for yamlUtils
 */

import { describe, it, expect } from 'vitest';
import { parseFrontmatterYAML, extractFrontmatter } from '../yamlUtils.js';

describe('yamlUtils', () => {
  describe('extractFrontmatter', () => {
    it('should extract frontmatter and body from valid markdown', () => {
      const content = `---
name: "deploy-helper"
description: "Helps with deploys"
---
Body text.`;

      const result = extractFrontmatter(content);
      expect(result).toEqual({
        frontmatter: 'name: "deploy-helper"\ndescription: "Helps with deploys"',
        body: 'Body text.',
      });
    });

    it('should return null for content without frontmatter', () => {
      expect(extractFrontmatter('Just some regular content')).toBeNull();
    });

    it('should return null when the closing delimiter is missing', () => {
      expect(extractFrontmatter('---\nname: x\nBody without closing')).toBeNull();
    });

    it('should normalize CRLF line endings', () => {
      const result = extractFrontmatter('---\r\nname: x\r\n---\r\nBody');
      expect(result).toEqual({ frontmatter: 'name: x', body: 'Body' });
    });
  });

  describe('parseFrontmatterYAML', () => {
    it('should parse quoted and unquoted scalars', () => {
      expect(parseFrontmatterYAML('name: "deploy"\ndescription: Ships builds')).toEqual({
        name: 'deploy',
        description: 'Ships builds',
      });
    });

    it('should parse hyphenated keys with JSON arrays', () => {
      expect(parseFrontmatterYAML('allowed-tools: ["read_file", "glob_search"]')).toEqual({
        'allowed-tools': ['read_file', 'glob_search'],
      });
    });

    it('should parse loose inline lists', () => {
      expect(parseFrontmatterYAML('allowed-tools: [read_file, web_fetch]')).toEqual({
        'allowed-tools': ['read_file', 'web_fetch'],
      });
    });

    it('should parse block lists', () => {
      const yaml = 'allowed-tools:\n  - read_file\n  - "run_shell_command"\nname: x';
      expect(parseFrontmatterYAML(yaml)).toEqual({
        'allowed-tools': ['read_file', 'run_shell_command'],
        name: 'x',
      });
    });

    it('should parse booleans', () => {
      expect(parseFrontmatterYAML('enabled: true\nhidden: false')).toEqual({
        enabled: true,
        hidden: false,
      });
    });
  });
});
