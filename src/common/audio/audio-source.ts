/**
 * 已解析的音频：时长（秒）+ 按时间切割
 * cut 返回独立拷贝，不修改源 buffer
 */
export interface AudioSource {
  readonly duration: number;
  cut(start: number, end: number): Buffer;
}
