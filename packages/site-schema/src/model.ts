/**
 * Documentation Model Schema
 *
 * The ordered metadata model handed to the site builder: assemblies contain
 * namespaces, namespaces contain types, types contain members. Every element
 * already carries its resolved page address.
 */

/**
 * All possible type kinds in the model.
 */
export type TypeKind = "class" | "struct" | "interface" | "enum" | "delegate";

/**
 * All possible member kinds in the model.
 */
export type MemberKind = "constructor" | "field" | "property" | "method" | "event" | "operator";

/**
 * A member of a type.
 */
export interface MemberModel {
  /** Member kind, decides the navigation group */
  kind: MemberKind;

  /** Display name (overloads share it, e.g. "Foo") */
  name: string;

  /** Address of the member's page, possibly with a fragment */
  url: string;

  /** Whether the member explicitly implements an interface member (e.g. "IDisposable.Dispose") */
  isExplicitInterfaceImplementation?: boolean;
}

/**
 * A documented type.
 */
export interface TypeModel {
  /** Type kind */
  kind: TypeKind;

  /** Display name (e.g. "List<T>") */
  name: string;

  /** Address of the type's page */
  url: string;

  /** Members in declaration order */
  members: MemberModel[];
}

/**
 * A namespace within an assembly.
 */
export interface NamespaceModel {
  /** Fully qualified namespace name (e.g. "Acme.Collections") */
  name: string;

  /** Address of the namespace's page */
  url: string;

  /** Types in the order supplied by the extractor */
  types: TypeModel[];
}

/**
 * A compiled library.
 */
export interface AssemblyModel {
  /** Assembly name (e.g. "Acme.Core") */
  name: string;

  /** Namespaces declared by the assembly */
  namespaces: NamespaceModel[];
}

/**
 * A conceptual topic. Topics arrive already ordered and nested.
 */
export interface TopicModel {
  /** Topic title */
  name: string;

  /** Address of the topic page */
  url: string;

  /** Child topics */
  subtopics: TopicModel[];
}

/**
 * Everything the site builder reads from the extraction layer.
 */
export interface DocumentationModel {
  assemblies: AssemblyModel[];

  /** Top-level topics */
  topics: TopicModel[];
}

/**
 * Collect the namespaces of all assemblies, merging namespaces that appear in
 * more than one assembly. Order is first appearance.
 */
export function collectNamespaces(assemblies: readonly AssemblyModel[]): NamespaceModel[] {
  const byName = new Map<string, NamespaceModel>();

  for (const assembly of assemblies) {
    for (const ns of assembly.namespaces) {
      const existing = byName.get(ns.name);
      if (existing) {
        existing.types.push(...ns.types);
      } else {
        byName.set(ns.name, { name: ns.name, url: ns.url, types: [...ns.types] });
      }
    }
  }

  return [...byName.values()];
}

/**
 * Collect every type of all assemblies in namespace order.
 */
export function collectTypes(assemblies: readonly AssemblyModel[]): TypeModel[] {
  return collectNamespaces(assemblies).flatMap((ns) => ns.types);
}
