export const IDP_HOST = "jaccount.sjtu.edu.cn";
export const CANVAS_CLIENT_URL = "https://oc.sjtu.edu.cn/login/openid_connect";
export const CAPTCHA_URL = "https://jaccount.sjtu.edu.cn/jaccount/captcha";
export const ULOGIN_URL = "https://jaccount.sjtu.edu.cn/jaccount/ulogin";
export const AUTH_COOKIE_NAME = "JAAuthCookie";

export const FAVORITES_URL = "https://oc.sjtu.edu.cn/api/v1/users/self/favorites/courses";
export const LTI_TOOL_ID = 8329;
export const ltiLaunchUrl = (subjectId: string | number) =>
  `https://oc.sjtu.edu.cn/courses/${subjectId}/external_tools/${LTI_TOOL_ID}`;

const VOD_BASE = "https://v.sjtu.edu.cn/jy-application-canvas-sjtu";
export const TOKEN_BY_ID_URL = `${VOD_BASE}/lti3/getAccessTokenByTokenId`;
export const VIDEO_LIST_URL = `${VOD_BASE}/directOnDemandPlay/findVodVideoList`;
export const VIDEO_INFO_URL = `${VOD_BASE}/directOnDemandPlay/getVodVideoInfos`;
export const TRANSCRIPT_URL = `${VOD_BASE}/transfer/translate/detail`;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:120.0) Gecko/20100101 Firefox/120.0";
export const AUTH_TIMEOUT_MS = 10_000;
