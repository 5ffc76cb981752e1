/**
 * Element counts from a SMILES string.
 *
 * Covers bracket atoms (isotope, explicit hydrogens, charge), the organic
 * subset with implicit hydrogens, aromatic atoms, bonds, branches and ring
 * closures. Stereo marks are read and ignored.
 */

export type ElementCounts = Map<string, number>;

const ORGANIC_VALENCES: Record<string, readonly number[]> = {
  B: [3],
  C: [4],
  N: [3, 5],
  O: [2],
  P: [3, 5],
  S: [2, 4, 6],
  F: [1],
  Cl: [1],
  Br: [1],
  I: [1],
};

const BOND_ORDERS: Record<string, number> = { "-": 1, "=": 2, "#": 3, $: 4, ":": 1, "/": 1, "\\": 1 };

/** Aromatic atoms whose ring bonds take one extra valence unit. */
const AROMATIC_BONUS = new Set(["b", "c", "n", "p"]);

interface Atom {
  element: string;
  /** Hydrogens given explicitly; undefined for organic-subset atoms */
  hydrogens?: number;
  aromatic: boolean;
  bondOrderSum: number;
}

export class SmilesParseError extends Error {
  constructor(message: string, public readonly smiles: string) {
    super(message);
    this.name = "SmilesParseError";
  }
}

function capitalize(symbol: string): string {
  return symbol.charAt(0).toUpperCase() + symbol.slice(1);
}

const BRACKET_ATOM = /^\[(\d*)([A-Z][a-z]?|se|as|[bcnops])(@*)(?:H(\d*))?([+-]+\d*)?(?::\d+)?\]/;
const ORGANIC_ATOM = /^(Cl|Br|[BCNOPSFI]|[bcnops])/;

export function parseSmiles(smiles: string): ElementCounts {
  const atoms: Atom[] = [];
  const branchStack: number[] = [];
  const rings = new Map<string, { atom: number; order: number | undefined }>();
  let previous: number | undefined;
  let pendingOrder: number | undefined;
  let index = 0;

  const bond = (from: number, to: number, order: number | undefined): void => {
    const a = atoms[from];
    const b = atoms[to];
    if (!a || !b) return;
    const value = order ?? 1;
    a.bondOrderSum += value;
    b.bondOrderSum += value;
  };

  const addAtom = (atom: Atom): void => {
    atoms.push(atom);
    const current = atoms.length - 1;
    if (previous !== undefined) bond(previous, current, pendingOrder);
    previous = current;
    pendingOrder = undefined;
  };

  while (index < smiles.length) {
    const rest = smiles.slice(index);
    const char = smiles.charAt(index);

    const bracket = BRACKET_ATOM.exec(rest);
    if (bracket) {
      const symbol = bracket[2] ?? "";
      const hydrogenText = bracket[4];
      addAtom({
        element: capitalize(symbol),
        hydrogens: hydrogenText === undefined ? 0 : hydrogenText === "" ? 1 : Number(hydrogenText),
        aromatic: symbol === symbol.toLowerCase(),
        bondOrderSum: 0,
      });
      index += bracket[0].length;
      continue;
    }

    const organic = ORGANIC_ATOM.exec(rest);
    if (organic) {
      const symbol = organic[1] ?? "";
      addAtom({
        element: capitalize(symbol),
        aromatic: symbol === symbol.toLowerCase(),
        bondOrderSum: 0,
      });
      index += symbol.length;
      continue;
    }

    if (char in BOND_ORDERS) {
      pendingOrder = BOND_ORDERS[char];
      index += 1;
      continue;
    }

    if (char === "(") {
      if (previous === undefined) throw new SmilesParseError("Branch before any atom", smiles);
      branchStack.push(previous);
      index += 1;
      continue;
    }
    if (char === ")") {
      const restored = branchStack.pop();
      if (restored === undefined) throw new SmilesParseError("Unbalanced parenthesis", smiles);
      previous = restored;
      index += 1;
      continue;
    }

    const ring = /^(%\d{2}|\d)/.exec(rest);
    if (ring) {
      const label = ring[1] ?? "";
      if (previous === undefined) throw new SmilesParseError("Ring closure before any atom", smiles);
      const open = rings.get(label);
      if (open) {
        bond(open.atom, previous, pendingOrder ?? open.order);
        rings.delete(label);
      } else {
        rings.set(label, { atom: previous, order: pendingOrder });
      }
      pendingOrder = undefined;
      index += label.length;
      continue;
    }

    if (char === ".") {
      previous = undefined;
      pendingOrder = undefined;
      index += 1;
      continue;
    }

    throw new SmilesParseError(`Unexpected "${char}" at position ${index}`, smiles);
  }

  if (branchStack.length > 0) throw new SmilesParseError("Unclosed branch", smiles);
  if (rings.size > 0) throw new SmilesParseError("Unclosed ring", smiles);

  const counts: ElementCounts = new Map();
  const add = (element: string, amount: number): void => {
    if (amount > 0) counts.set(element, (counts.get(element) ?? 0) + amount);
  };
  for (const atom of atoms) {
    add(atom.element, 1);
    add("H", atom.hydrogens ?? implicitHydrogens(atom));
  }
  return counts;
}

function implicitHydrogens(atom: Atom): number {
  const valences = ORGANIC_VALENCES[atom.element] ?? [];
  const used = atom.bondOrderSum + (atom.aromatic && AROMATIC_BONUS.has(atom.element.toLowerCase()) ? 1 : 0);
  const valence = valences.find((candidate) => candidate >= used);
  return valence === undefined ? 0 : valence - used;
}
