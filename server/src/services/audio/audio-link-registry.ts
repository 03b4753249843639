/**
 * Audio link registry
 * Turns playable links found in article bodies into markup that registers the
 * link with the rendered page, keyed by the owning source. The page keeps the
 * links; nothing is held server-side.
 */

export interface AudioLinkRegistry {
  /**
   * @param rawUrlLiteral - the URL as a quoted JavaScript string literal, e.g. `"https://host/a.ogg"`
   * @param ownerId - id of the source the article belongs to
   * @returns markup to place just before the play affordance
   */
  register(rawUrlLiteral: string, ownerId: string): string;
}

export class ScriptAudioLinkRegistry implements AudioLinkRegistry {
  register(rawUrlLiteral: string, ownerId: string): string {
    const ownerKey = JSON.stringify(ownerId);
    return '<script type="text/javascript">'
      + `if(!audioLinks.first){audioLinks.first=${rawUrlLiteral};}`
      + `if(!audioLinks[${ownerKey}]){audioLinks[${ownerKey}]=${rawUrlLiteral};}`
      + '</script>';
  }
}
