/**
 * Certificate texts as a PDF text layer or OCR would return them.
 */
export const FILLER =
    'This document certifies the grant described below and is issued by the office.\n' +
    'This document certifies the grant described below and is issued by the office.\n';

export const PATENT_TEXT = [
    '发明专利证书',
    '发明名称：一种文档元数据抽取方法',
    '发明人：张三;李四;王五',
    '专利号：ZL 2022 1 1551727.X',
    '专利申请日：2022年12月06日',
    '专利权人：某某大学',
    '授权公告日：2023年04月18日',
    '授权公告号：CN116055099B',
].join('\n');

/** Text layer that only carries the number and the patentee */
export const SPARSE_PATENT_TEXT = `发明专利证书\n专利号：ZL202211551727.X\n专利权人：某某大学\n${FILLER}`;

/** OCR of the same certificate, read with a different number and patentee */
export const PATENT_OCR_TEXT = [
    '发明名称：一种文档元数据抽取方法',
    '发明人：张三;李四;王五',
    '专利号：ZL202311112222.3',
    '专利申请日：2022年12月06日',
    '专利权人：另一单位',
    '授权公告日：2023年04月18日',
    '授权公告号：CN116055099B',
].join('\n');

export const SOFTWARE_TEXT = [
    '计算机软件著作权登记证书',
    '软件名称：文献管理系统 V2.1',
    '著作权人：某某大学',
    '开发完成日期：2023年03月15日',
    '登记号：2023SR0123456',
].join('\n');
