/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { MeshPrimitive } from '@cycles-xml/scene';
import { element, formatNumbers, type XmlAttribute, type XmlElement } from './document.js';

/**
 * Mesh element: points, face vertex counts, vertex ids and, for
 * Catmull-Clark meshes, a subdivision hint. Linear is the renderer default.
 */
export function writeMesh(mesh: MeshPrimitive): XmlElement {
  const attributes: XmlAttribute[] = [
    ['P', formatNumbers(mesh.points)],
    ['nverts', formatNumbers(mesh.verticesPerFace)],
    ['verts', formatNumbers(mesh.vertexIds)],
  ];
  if (mesh.interpolation === 'catmullClark') {
    attributes.push(['subdivision', 'catmull-clark']);
  }
  return element('mesh', attributes);
}
