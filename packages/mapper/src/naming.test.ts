import { describe, it } from "mocha";
import { expect } from "chai";
import {
  sourceField,
  sourceFunction,
  sourceType,
  sourceUnit,
} from "@semport/frontend";
import { mapFixtureType } from "./fixtures.js";

describe("Member naming", () => {
  it("should rename a synthesized method that collides with a source method", () => {
    const mapping = mapFixtureType(
      [
        sourceUnit("stream.hpp", [
          sourceType("Stream", [
            sourceField("fd", "int", { ownsResource: true }),
            sourceFunction("Stream", { acquires: ["fd"] }),
            sourceFunction("~Stream", { releases: ["fd"] }),
            sourceFunction("close", { returnType: "void", body: "flush();" }),
          ]),
        ]),
      ],
      "Stream"
    );

    const names = (mapping.declaration?.members ?? []).flatMap((m) =>
      m.kind === "constructor" ? [] : [m.name]
    );
    expect(names).to.deep.equal(["fd", "released", "close_2", "close"]);

    const destructor = mapping.members[2]?.outcome;
    expect(destructor?.status).to.equal("bestEffort");
    if (destructor?.status !== "bestEffort") return;
    expect(destructor.notes).to.deep.equal([
      {
        code: "SPM5001",
        message:
          "synthesized member 'close' collides with an existing member and was renamed to 'close_2'",
      },
    ]);
  });

  it("should rename the release guard and keep the release body pointing at it", () => {
    const mapping = mapFixtureType(
      [
        sourceUnit("pool.hpp", [
          sourceType("Pool", [
            sourceField("released", "int"),
            sourceField("slab", "char*"),
            sourceFunction("Pool", { acquires: ["slab"] }),
            sourceFunction("~Pool", { releases: ["slab"] }),
          ]),
        ]),
      ],
      "Pool"
    );

    const members = mapping.declaration?.members ?? [];
    const close = members.find((m) => m.kind === "method" && m.name === "close");
    expect(
      close?.kind === "method" && close.body.kind === "release"
        ? close.body.guard
        : undefined
    ).to.equal("released_2");
    expect(
      members.some((m) => m.kind === "field" && m.name === "released_2")
    ).to.equal(true);
  });

  it("should keep overloads with different parameter types apart", () => {
    const mapping = mapFixtureType(
      [
        sourceUnit("num.hpp", [
          sourceType("Num", [
            sourceField("value", "int"),
            sourceFunction("add", {
              parameters: [{ name: "n", type: "int" }],
              returnType: "Num",
            }),
            sourceFunction("operator+", {
              parameters: [{ name: "other", type: "const Num&" }],
              returnType: "Num",
              reads: ["value"],
            }),
          ]),
        ]),
      ],
      "Num"
    );

    expect(mapping.members.map((m) => m.outcome.status)).to.deep.equal([
      "mapped",
      "mapped",
      "mapped",
    ]);
  });
});
