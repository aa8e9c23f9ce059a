/**
 * Bounding Box Berechnung
 *
 * Die Box wächst mit jedem belichteten Punkt und wird nie kleiner.
 * Für Mehrquadranten-Bögen wird eine schnelle, konservative Hülle
 * berechnet: Start, Ende und die Achsenextrema des Kreises, die
 * tatsächlich im überstrichenen Bereich liegen. Der Bogen selbst wird
 * nicht abgetastet.
 */

import type { ArcDirection, BoundingBox, Point } from '@/types';

/**
 * Laufende Grenzen; null, solange noch kein Punkt beigetragen hat
 */
export interface Boundaries {
  minX: number | null;
  maxX: number | null;
  minY: number | null;
  maxY: number | null;
}

const FULL_TURN = Math.PI * 2;

/** Winkel der vier Achsenextrema: rechts, oben, links, unten */
const CARDINAL_ANGLES = [0, Math.PI / 2, Math.PI, (Math.PI * 3) / 2];

export function createBoundaries(): Boundaries {
  return { minX: null, maxX: null, minY: null, maxY: null };
}

/**
 * Erweitert die Grenzen um einen Punkt
 */
export function includePoint(bounds: Boundaries, point: Point): void {
  bounds.minX = bounds.minX === null ? point.x : Math.min(bounds.minX, point.x);
  bounds.maxX = bounds.maxX === null ? point.x : Math.max(bounds.maxX, point.x);
  bounds.minY = bounds.minY === null ? point.y : Math.min(bounds.minY, point.y);
  bounds.maxY = bounds.maxY === null ? point.y : Math.max(bounds.maxY, point.y);
}

/**
 * Erweitert die Grenzen um einen Mehrquadranten-Bogen
 *
 * @param start - Startpunkt (letzte Position)
 * @param end - Endpunkt
 * @param offset - Vektor vom Start zum Mittelpunkt (I/J)
 * @param direction - Drehrichtung
 *
 * Start gleich Ende bedeutet Vollkreis.
 */
export function includeArc(
  bounds: Boundaries,
  start: Point,
  end: Point,
  offset: Point,
  direction: ArcDirection
): void {
  for (const point of arcCandidates(start, end, offset, direction)) {
    includePoint(bounds, point);
  }
}

/**
 * Punkte, die die Hülle eines Bogens aufspannen
 */
export function arcCandidates(start: Point, end: Point, offset: Point, direction: ArcDirection): Point[] {
  const center = { x: start.x + offset.x, y: start.y + offset.y };
  const radius = Math.hypot(offset.x, offset.y);
  const cardinal = (angle: number): Point => ({
    x: center.x + radius * Math.round(Math.cos(angle)),
    y: center.y + radius * Math.round(Math.sin(angle)),
  });

  if (samePoint(start, end)) {
    return [start, ...CARDINAL_ANGLES.map(cardinal)];
  }

  const startAngle = angleOf(center, start);
  const endAngle = angleOf(center, end);
  const sweep =
    direction === 'counter-clockwise'
      ? normalizeAngle(endAngle - startAngle)
      : normalizeAngle(startAngle - endAngle);

  const points = [start, end];
  for (const angle of CARDINAL_ANGLES) {
    const travelled =
      direction === 'counter-clockwise'
        ? normalizeAngle(angle - startAngle)
        : normalizeAngle(startAngle - angle);
    if (travelled <= sweep) {
      points.push(cardinal(angle));
    }
  }

  return points;
}

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Wandelt die Grenzen in eine vollständige Box um
 *
 * @returns null, solange kein Punkt beigetragen hat
 */
export function toBoundingBox(bounds: Boundaries): BoundingBox | null {
  if (bounds.minX === null || bounds.maxX === null || bounds.minY === null || bounds.maxY === null) {
    return null;
  }
  return { minX: bounds.minX, minY: bounds.minY, maxX: bounds.maxX, maxY: bounds.maxY };
}

function angleOf(center: Point, point: Point): number {
  return normalizeAngle(Math.atan2(point.y - center.y, point.x - center.x));
}

function normalizeAngle(angle: number): number {
  const wrapped = angle % FULL_TURN;
  return wrapped < 0 ? wrapped + FULL_TURN : wrapped;
}
