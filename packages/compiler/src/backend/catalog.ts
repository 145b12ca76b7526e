/**
 * Component catalog: walks the top-level classes of a program and reports the ones
 * deriving from the component base class, with their settable properties.
 */

import ts from "typescript";
import type { ComponentDescriptor, ComponentOrigin, ComponentProperty } from "@playbench/shared";
import { toKebabCase } from "@playbench/template";

export interface CatalogFile {
  /** File name inside the program */
  fileName: string;
  /** Path reported in descriptors */
  filePath: string;
  origin: ComponentOrigin;
}

// Guards against cyclic `extends` chains, which the checker reports separately.
const MAX_BASE_DEPTH = 32;

const HIDDEN_MODIFIERS = ts.ModifierFlags.Private | ts.ModifierFlags.Protected | ts.ModifierFlags.Static | ts.ModifierFlags.Readonly;

export function collectComponents(
  program: ts.Program,
  files: readonly CatalogFile[],
  baseClass: string,
): ComponentDescriptor[] {
  const checker = program.getTypeChecker();
  const components: ComponentDescriptor[] = [];

  for (const file of files) {
    const sourceFile = program.getSourceFile(file.fileName);
    if (!sourceFile) continue;

    for (const statement of sourceFile.statements) {
      if (!ts.isClassDeclaration(statement) || !statement.name) continue;
      if (ts.getCombinedModifierFlags(statement) & ts.ModifierFlags.Abstract) continue;

      const symbol = checker.getSymbolAtLocation(statement.name);
      if (!symbol) continue;
      const type = checker.getDeclaredTypeOfSymbol(symbol);
      if (!derivesFrom(checker, type, baseClass, 0)) continue;

      const name = statement.name.text;
      components.push({
        name,
        tagName: toKebabCase(name),
        file: file.filePath,
        origin: file.origin,
        properties: settableProperties(checker, type, baseClass),
      });
    }
  }

  return components;
}

function derivesFrom(checker: ts.TypeChecker, type: ts.Type, baseClass: string, depth: number): boolean {
  if (depth > MAX_BASE_DEPTH || !type.isClassOrInterface()) return false;
  for (const base of checker.getBaseTypes(type)) {
    if (base.getSymbol()?.getName() === baseClass) return true;
    if (derivesFrom(checker, base, baseClass, depth + 1)) return true;
  }
  return false;
}

function settableProperties(checker: ts.TypeChecker, type: ts.Type, baseClass: string): ComponentProperty[] {
  const properties: ComponentProperty[] = [];
  for (const property of checker.getPropertiesOfType(type)) {
    if (!(property.getFlags() & (ts.SymbolFlags.Property | ts.SymbolFlags.SetAccessor))) continue;

    const declaration = property.valueDeclaration ?? property.getDeclarations()?.[0];
    if (!declaration || isDeclaredOnBase(declaration, baseClass)) continue;
    if (ts.getCombinedModifierFlags(declaration) & HIDDEN_MODIFIERS) continue;

    const name = property.getName();
    if (name.startsWith("#") || name.startsWith("__#")) continue;

    properties.push({
      name,
      type: checker.typeToString(checker.getTypeOfSymbolAtLocation(property, declaration)),
    });
  }
  return properties;
}

function isDeclaredOnBase(declaration: ts.Declaration, baseClass: string): boolean {
  const owner = declaration.parent;
  return ts.isClassDeclaration(owner) && owner.name?.text === baseClass;
}
