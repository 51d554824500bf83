import { v } from "@warlock.js/seal";
import { Model } from "../../../src/model/model";
import { RegisterModel } from "../../../src/model/register-model";
import { belongsTo, hasMany } from "../../../src/relations/helpers";

/**
 * Fixture: User owning posts, no cascade
 */
@RegisterModel()
export class User extends Model {
  public static table = "users";

  public static relations = {
    posts: hasMany("Post"),
    team: belongsTo("Team"),
  };
}

/**
 * Fixture: Post with a required title, destroying its comments with it
 */
@RegisterModel()
export class Post extends Model {
  public static table = "posts";

  public static schema = v.object({
    title: v.string().required(),
  });

  public static relations = {
    author: belongsTo("User", { foreignKey: "userId" }),
    comments: hasMany("Comment", { dependent: "destroy" }),
  };
}

/**
 * Fixture: Comment
 */
@RegisterModel()
export class Comment extends Model {
  public static table = "comments";

  public static relations = {
    post: belongsTo("Post"),
  };
}

/**
 * Fixture: Team destroying its members with it
 */
@RegisterModel()
export class Team extends Model {
  public static table = "teams";

  public static relations = {
    members: hasMany("User", { dependent: "destroy" }),
  };
}

/**
 * Fixture: Blog refusing deletion while it has posts
 */
@RegisterModel()
export class Blog extends Model {
  public static table = "blogs";

  public static relations = {
    posts: hasMany("Post", { dependent: "restrictWithException" }),
  };
}

/**
 * Fixture: Forum recording an error instead of deleting while it has posts
 */
@RegisterModel()
export class Forum extends Model {
  public static table = "forums";

  public static relations = {
    posts: hasMany("Post", { dependent: "restrictWithError" }),
  };
}

/**
 * Fixture: Board bulk-deleting its posts
 */
@RegisterModel()
export class Board extends Model {
  public static table = "boards";

  public static relations = {
    posts: hasMany("Post", { dependent: "deleteAll" }),
  };
}
