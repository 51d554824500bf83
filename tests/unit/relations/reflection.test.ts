import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../../src/errors";
import { Model } from "../../../src/model/model";
import {
  belongsTo,
  hasMany,
  hasOne,
  validateRelationOptions,
  type RelationsDeclaration,
} from "../../../src/relations";
import { transition } from "../../../src/relations/association-state";
import { buildReflection } from "../../../src/relations/relation-builder";
import { Comment, Post, Team, User } from "../../fixtures/models/test-models";

class Member extends Model {
  public static table = "members";

  public static relations: RelationsDeclaration = {
    posts: hasMany(Post, { foreignKey: "memberId" }),
    team: belongsTo(Team),
  };
}

class Moderator extends Member {
  public static relations: RelationsDeclaration = {
    flags: hasMany(Comment, { foreignKey: "moderatorId" }),
    team: hasOne(Team, { foreignKey: "managedTeamId" }),
  };
}

class Profile extends Model {
  public static table = "profiles";

  public static relations: RelationsDeclaration = {
    owner: belongsTo(User),
    avatar: belongsTo(User),
  };

  public get owner(): string {
    return "custom";
  }
}

describe("Relation declarations", () => {
  it("should reject unknown options when declared", () => {
    expect(() => validateRelationOptions("hasMany", { fooBar: true }, "posts")).toThrow(
      ConfigurationError,
    );
    expect(() => validateRelationOptions("belongsTo", { dependent: "destroy" }, "author")).toThrow(
      'Unknown option "dependent" for belongsTo relation "author". ' +
        "Allowed options: virtualValue, embed, except, only, serializer, foreignKey, localKey.",
    );
  });

  it("should list every unknown option", () => {
    expect(() => validateRelationOptions("hasOne", { a: 1, b: 2 })).toThrow(
      'Unknown options "a", "b" for hasOne relation.',
    );
  });

  it("should reject invalid policy and embed values", () => {
    expect(() => validateRelationOptions("hasMany", { dependent: "nullify" })).toThrow(
      'Invalid dependent policy "nullify". ' +
        "Expected one of: restrictWithException, restrictWithError, destroy, deleteAll.",
    );
    expect(() => validateRelationOptions("belongsTo", { embed: "inline" })).toThrow(
      'Invalid embed mode "inline". Expected "objects" or "ids".',
    );
  });

  it("should reject names that are not identifiers", () => {
    expect(() => buildReflection(Member, "my posts", hasMany(Post))).toThrow(
      'Invalid relation name "my posts" on Member: names must be plain identifiers.',
    );
  });
});

describe("Reflection", () => {
  it("should derive keys from names", () => {
    const posts = User.reflectOnAssociation("posts");
    const post = Comment.reflectOnAssociation("post");

    expect(posts?.foreignKey).toBe("userId");
    expect(posts?.localKey).toBe("id");
    expect(posts?.kind).toBe("toMany");
    expect(posts?.isCollection).toBe(true);
    expect(post?.foreignKey).toBe("postId");
    expect(post?.localKey).toBe("id");
    expect(post?.kind).toBe("toOne");
  });

  it("should take keys and policy from options", () => {
    const author = Post.reflectOnAssociation("author");
    const comments = Post.reflectOnAssociation("comments");

    expect(author?.foreignKey).toBe("userId");
    expect(comments?.dependent).toBe("destroy");
    expect(User.reflectOnAssociation("posts")?.dependent).toBeUndefined();
  });

  it("should resolve related models by name or class", () => {
    const author = Post.reflectOnAssociation("author");
    const team = Member.reflectOnAssociation("team");

    expect(author?.relatedModelName).toBe("User");
    expect(author?.relatedModel()).toBe(User);
    expect(author?.pointsAt(User)).toBe(true);
    expect(author?.pointsAt(Team)).toBe(false);
    expect(team?.relatedModel()).toBe(Team);
  });

  it("should fail to resolve an unregistered model name", () => {
    const ghost = buildReflection(Member, "ghost", belongsTo("Ghost"));

    expect(() => ghost.relatedModel()).toThrow(
      'Model "Ghost" used by relation "ghost" of Member is not registered. ' +
        "Decorate it with @RegisterModel().",
    );
  });

  it("should be immutable", () => {
    const reflection = User.reflectOnAssociation("posts");

    expect(Object.isFrozen(reflection)).toBe(true);
    expect(Object.isFrozen(reflection?.options)).toBe(true);
  });
});

describe("ReflectionRegistry", () => {
  it("should list relationships in declaration order", () => {
    const registry = Post.reflections();

    expect(registry.names()).toEqual(["author", "comments"]);
    expect(registry.size).toBe(2);
    expect(registry.has("author")).toBe(true);
    expect(registry.collections().map((reflection) => reflection.name)).toEqual(["comments"]);
  });

  it("should inherit parent relationships and let children override them", () => {
    expect(Moderator.reflections().names()).toEqual(["posts", "team", "flags"]);
    expect(Moderator.reflectOnAssociation("team")?.type).toBe("hasOne");
    expect(Moderator.reflectOnAssociation("posts")?.owner).toBe(Member);
    expect(Member.reflectOnAssociation("team")?.type).toBe("belongsTo");
    expect(Member.reflections().has("flags")).toBe(false);
  });

  it("should build the registry once per class", () => {
    expect(Moderator.reflections()).toBe(Moderator.reflections());
    expect(Moderator.relationAccessors().size).toBe(3);
  });
});

describe("Relation accessors", () => {
  it("should keep a getter already defined under the relationship name", () => {
    const profile = new Profile({ owner: "raw", avatar: "raw avatar" });

    expect(profile.relatedRaw("owner")).toBe("custom");
    expect(profile.relatedRaw("avatar")).toBe("raw avatar");
  });

  it("should reject undeclared relationships", () => {
    expect(() => new Profile().relatedRaw("friends")).toThrow(
      'Association "friends" is not declared on Profile.',
    );
  });
});

describe("Association state", () => {
  it("should move between states on load, reset and key change", () => {
    expect(transition("notLoaded", "load")).toBe("loaded");
    expect(transition("notLoaded", "keyChanged")).toBe("notLoaded");
    expect(transition("loaded", "keyChanged")).toBe("stale");
    expect(transition("loaded", "reset")).toBe("notLoaded");
    expect(transition("stale", "load")).toBe("loaded");
    expect(transition("stale", "reset")).toBe("notLoaded");
    expect(transition("stale", "keyChanged")).toBe("stale");
  });
});
