/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Markup document builder
 *
 * Blocks are collected as element trees and only turned into text by
 * render(), so tests can inspect structure and text independently.
 */

import type { Mat4 } from '@cycles-xml/scene';

export type XmlAttribute = readonly [name: string, value: string];

export interface XmlElement {
  tag: string;
  attributes: readonly XmlAttribute[];
  children: readonly XmlElement[];
}

function isAttributeList(
  attributes: readonly XmlAttribute[] | Readonly<Record<string, string>>
): attributes is readonly XmlAttribute[] {
  return Array.isArray(attributes);
}

/**
 * Create an element. Attributes keep the order they are given in.
 */
export function element(
  tag: string,
  attributes: readonly XmlAttribute[] | Readonly<Record<string, string>> = [],
  children: readonly XmlElement[] = []
): XmlElement {
  return {
    tag,
    attributes: isAttributeList(attributes) ? attributes : Object.entries(attributes),
    children,
  };
}

/**
 * Value of an attribute, or undefined when absent
 */
export function getAttribute(el: XmlElement, name: string): string | undefined {
  return el.attributes.find(([key]) => key === name)?.[1];
}

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function formatNumbers(values: ArrayLike<number>): string {
  return Array.from(values, (v) => String(v)).join(' ');
}

/** 16 space-separated values in storage order */
export function formatMatrix(matrix: Mat4): string {
  return formatNumbers(matrix.m);
}

export function renderElement(el: XmlElement, depth = 0): string {
  const indent = '\t'.repeat(depth);
  const attributes = el.attributes.map(([name, value]) => ` ${name}="${escapeXml(value)}"`).join('');

  if (el.children.length === 0) {
    return `${indent}<${el.tag}${attributes} />`;
  }

  const children = el.children.map((child) => renderElement(child, depth + 1)).join('\n');
  return `${indent}<${el.tag}${attributes}>\n${children}\n${indent}</${el.tag}>`;
}

/**
 * Ordered, append-only list of top-level blocks
 */
export class SceneDocument {
  private readonly entries: XmlElement[] = [];

  append(block: XmlElement): void {
    this.entries.push(block);
  }

  get blocks(): readonly XmlElement[] {
    return this.entries;
  }

  /** Top-level blocks with the given tag, in document order */
  blocksByTag(tag: string): XmlElement[] {
    return this.entries.filter((block) => block.tag === tag);
  }

  /**
   * Render to text: one element per line, children indented by a tab,
   * a blank line between blocks
   */
  render(): string {
    if (this.entries.length === 0) return '';
    return this.entries.map((block) => renderElement(block)).join('\n\n') + '\n';
  }
}
