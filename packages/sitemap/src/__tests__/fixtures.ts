import type { DocumentationModel } from "@apisite/site-schema";

/**
 * A small documentation model: one namespace with a class and an enum, and
 * a guide with one subtopic.
 */
export function createSampleModel(): DocumentationModel {
  return {
    assemblies: [
      {
        name: "Acme.Core",
        namespaces: [
          {
            name: "Acme",
            url: "api/Acme.html",
            types: [
              {
                kind: "class",
                name: "Widget",
                url: "api/Acme.Widget.html",
                members: [
                  { kind: "constructor", name: "Widget", url: "api/Acme.Widget.-ctor.html#M1" },
                  { kind: "constructor", name: "Widget", url: "api/Acme.Widget.-ctor.html#M2" },
                  { kind: "method", name: "Foo", url: "api/Acme.Widget.Foo.html#int" },
                  { kind: "method", name: "Foo", url: "api/Acme.Widget.Foo.html#string" },
                  { kind: "property", name: "Size", url: "api/Acme.Widget.Size.html" },
                  { kind: "method", name: "Dispose", url: "api/Acme.Widget.Dispose.html" },
                  {
                    kind: "method",
                    name: "IDisposable.Dispose",
                    url: "api/Acme.Widget.IDisposable-Dispose.html",
                    isExplicitInterfaceImplementation: true,
                  },
                  { kind: "field", name: "Empty", url: "api/Acme.Widget.Empty.html" },
                  { kind: "event", name: "Changed", url: "api/Acme.Widget.Changed.html" },
                  { kind: "operator", name: "operator ==", url: "api/Acme.Widget.op_Equality.html" },
                ],
              },
              {
                kind: "enum",
                name: "Color",
                url: "api/Acme.Color.html",
                members: [{ kind: "field", name: "Red", url: "api/Acme.Color.html#Red" }],
              },
            ],
          },
        ],
      },
    ],
    topics: [
      {
        name: "Guide",
        url: "guide/index.html",
        subtopics: [{ name: "Install", url: "guide/install.html#top", subtopics: [] }],
      },
    ],
  };
}
